/**
 * Catalog document loading for `init-data`.
 *
 * Accepts either an array of entries or `{ "problems": [...] }`.
 */

import fs from 'fs';
import { z } from 'zod';
import { CatalogDocumentError, toErrorMessage } from '../../system/error-handling';
import type { Difficulty, NewProblem } from '../types';

export const ProblemExampleSchema = z.object({
  input: z.string(),
  output: z.string(),
  explanation: z.string().optional()
});

export const ProblemTestCaseSchema = z.object({
  input: z.string(),
  expected_output: z.string()
});

const DifficultySchema = z
  .string()
  .transform(value => value.trim().toLowerCase())
  .pipe(z.enum(['easy', 'medium', 'hard']));

const ConstraintsSchema = z
  .union([z.string(), z.array(z.string())])
  .transform(value => (typeof value === 'string' ? splitLines(value) : value));

const CatalogEntrySchema = z.object({
  id: z.string().trim().min(1).optional(),
  title: z.string().trim().min(1),
  description: z.string().trim().min(1),
  difficulty: DifficultySchema,
  tags: z.array(z.string()).default([]),
  constraints: ConstraintsSchema.default([]),
  examples: z.array(ProblemExampleSchema).default([]),
  hints: z.array(z.string()).default([]),
  test_cases: z.array(ProblemTestCaseSchema).default([])
});

const CatalogDocumentSchema = z.union([
  z.array(CatalogEntrySchema),
  z.object({ problems: z.array(CatalogEntrySchema) })
]);

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;

/**
 * `"Two Sum"` → `two-sum`
 */
export function slugify(title: string): string {
  return title
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

function splitLines(text: string): string[] {
  return text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/**
 * Validate a parsed document and turn it into catalog rows.
 */
export function parseCatalogDocument(document: unknown): NewProblem[] {
  const parsed = CatalogDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${location}: ${issue.message}`;
    });
    throw new CatalogDocumentError(`Invalid catalog document:\n  - ${issues.join('\n  - ')}`, issues);
  }

  const entries = Array.isArray(parsed.data) ? parsed.data : parsed.data.problems;
  const problems = entries.map(toProblem);

  const issues: string[] = [];
  const seen = new Map<string, number>();
  const titles = new Map<string, number>();
  problems.forEach((problem, index) => {
    const sameTitle = titles.get(problem.title);
    if (sameTitle !== undefined) {
      issues.push(`${index}.title: duplicate title "${problem.title}" (first used by entry ${sameTitle})`);
    } else {
      titles.set(problem.title, index);
    }

    if (!problem.identity) {
      issues.push(`${index}.title: cannot derive an id from "${problem.title}"`);
      return;
    }
    const first = seen.get(problem.identity);
    if (first !== undefined) {
      issues.push(`${index}: duplicate id "${problem.identity}" (first used by entry ${first})`);
    } else {
      seen.set(problem.identity, index);
    }
  });
  if (issues.length > 0) {
    throw new CatalogDocumentError(`Invalid catalog document:\n  - ${issues.join('\n  - ')}`, issues);
  }

  return problems;
}

/**
 * Read and validate a JSON catalog file.
 */
export function loadCatalogDocument(file: string): NewProblem[] {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (error) {
    throw new CatalogDocumentError(`Cannot read catalog file ${file}: ${toErrorMessage(error)}`);
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new CatalogDocumentError(`Catalog file ${file} is not valid JSON: ${toErrorMessage(error)}`);
  }
  return parseCatalogDocument(document);
}

function toProblem(entry: CatalogEntry): NewProblem {
  const difficulty: Difficulty = entry.difficulty;
  return {
    identity: entry.id ?? slugify(entry.title),
    title: entry.title,
    description: entry.description,
    difficulty,
    tags: Array.from(new Set(entry.tags.map(tag => tag.trim()).filter(tag => tag.length > 0))),
    constraints: entry.constraints,
    examples: entry.examples,
    hints: entry.hints,
    test_cases: entry.test_cases
  };
}
