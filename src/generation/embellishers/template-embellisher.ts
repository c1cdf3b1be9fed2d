/**
 * Offline embellisher: picks quips from a template file according to what the
 * solution code appears to do.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Embellisher, Embellishment, ProblemPayload, Solution } from '../../delivery/types';
import { LANGUAGE_PROFILES } from '../../system/config/languages';
import { EmbellishmentError, toErrorMessage } from '../../system/error-handling';
import { Logger, createModuleLogger } from '../../system/logging/logger';

export const DEFAULT_HUMOR_TEMPLATES_FILE = path.resolve(__dirname, '../../../data/humor-templates.json');

export type HumorCategory =
  | 'general'
  | 'loops'
  | 'arrays'
  | 'hash_maps'
  | 'recursion'
  | 'sorting'
  | 'binary_search'
  | 'dynamic_programming';

const QuipListSchema = z.array(z.string().min(1)).min(1);

const HumorTemplatesSchema = z.object({
  general: QuipListSchema,
  loops: QuipListSchema.optional(),
  arrays: QuipListSchema.optional(),
  hash_maps: QuipListSchema.optional(),
  recursion: QuipListSchema.optional(),
  sorting: QuipListSchema.optional(),
  binary_search: QuipListSchema.optional(),
  dynamic_programming: QuipListSchema.optional()
});

export type HumorTemplates = z.infer<typeof HumorTemplatesSchema>;

const CATEGORY_PATTERNS: ReadonlyArray<[Exclude<HumorCategory, 'general' | 'recursion'>, RegExp]> = [
  ['dynamic_programming', /\bdp\b|memo|lru_cache|@cache\b/],
  ['binary_search', /\bmid\b|bisect|binary_?search/],
  ['sorting', /sort/],
  ['hash_maps', /\b(?:map|hashmap|dict|set|hashset|unordered_map)\b|\{\s*\}/],
  ['loops', /\b(?:for|while|loop)\b/],
  ['arrays', /\[|\b(?:array|list|vec|vector|slice)\b/]
];

const FUNCTION_NAME_PATTERN = /\b(?:def|fn|func|function)\s+([A-Za-z_]\w*)/g;

function isRecursive(code: string): boolean {
  for (const match of code.matchAll(FUNCTION_NAME_PATTERN)) {
    const name = match[1];
    const calls = code.split(`${name}(`).length - 1;
    if (calls >= 2) {
      return true;
    }
  }
  return false;
}

/**
 * Categories that apply to the code, most specific first, `general` last
 */
export function analyzeCode(code: string): HumorCategory[] {
  const lower = code.toLowerCase();
  const categories: HumorCategory[] = [];

  if (isRecursive(code)) {
    categories.push('recursion');
  }
  for (const [category, pattern] of CATEGORY_PATTERNS) {
    if (pattern.test(lower)) {
      categories.push(category);
    }
  }
  categories.push('general');
  return categories;
}

export function loadHumorTemplates(file: string = DEFAULT_HUMOR_TEMPLATES_FILE): HumorTemplates {
  let document: unknown;
  try {
    document = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    throw new EmbellishmentError(`Cannot read humor templates ${file}: ${toErrorMessage(error)}`, error);
  }

  const parsed = HumorTemplatesSchema.safeParse(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new EmbellishmentError(`Invalid humor templates ${file}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue'}`);
  }
  return parsed.data;
}

export interface TemplateEmbellisherOptions {
  /** Inline templates; otherwise read from `templatesFile` */
  templates?: HumorTemplates;
  templatesFile?: string;
  random?: () => number;
  logger?: Logger;
}

export class TemplateEmbellisher implements Embellisher {
  private templates: HumorTemplates | null;
  private templatesFile: string;
  private random: () => number;
  private logger: Logger;

  constructor(options: TemplateEmbellisherOptions = {}) {
    this.templates = options.templates ?? null;
    this.templatesFile = options.templatesFile ?? DEFAULT_HUMOR_TEMPLATES_FILE;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createModuleLogger('generation.templates');
  }

  async embellish(_problem: ProblemPayload, solution: Solution): Promise<Embellishment> {
    if (!solution.code.trim()) {
      throw new EmbellishmentError('No solution code to embellish');
    }

    const templates = this.getTemplates();
    const categories = analyzeCode(solution.code);
    const commentary = this.pickQuips(templates, categories);
    const prefix = LANGUAGE_PROFILES[solution.language].commentPrefix;

    this.logger.debug('Embellished solution', { categories, quips: commentary.length }, 'embellish');

    return {
      commentary,
      annotatedCode: [...commentary.map(quip => `${prefix} ${quip}`), '', solution.code].join('\n')
    };
  }

  /**
   * Two or three distinct quips, cycling through the categories in order
   */
  private pickQuips(templates: HumorTemplates, categories: HumorCategory[]): string[] {
    const count = 2 + Math.min(1, Math.floor(this.random() * 2));
    const quips: string[] = [];

    for (let attempt = 0; quips.length < count && attempt < count * 4; attempt++) {
      const category = categories[attempt % categories.length];
      const pool = templates[category] ?? templates.general;
      const index = Math.min(pool.length - 1, Math.floor(this.random() * pool.length));
      let quip = pool[index];
      for (let offset = 1; quips.includes(quip) && offset < pool.length; offset++) {
        quip = pool[(index + offset) % pool.length];
      }
      if (!quips.includes(quip)) {
        quips.push(quip);
      }
    }
    return quips;
  }

  private getTemplates(): HumorTemplates {
    if (!this.templates) {
      this.templates = loadHumorTemplates(this.templatesFile);
    }
    return this.templates;
  }
}
