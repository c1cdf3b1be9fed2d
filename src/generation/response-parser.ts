/**
 * Parsing of sectioned solution responses
 */

import { LANGUAGE_PROFILES, Language } from '../system/config/languages';

export interface ParsedSolution {
  code: string;
  explanation: string;
  timeComplexity: string;
  spaceComplexity: string;
  approach: string;
}

type SectionKey = keyof ParsedSolution;

const SECTION_HEADERS: ReadonlyArray<[RegExp, SectionKey]> = [
  [/^[#*\s]*solution[*\s]*:[*\s]*(.*)$/i, 'code'],
  [/^[#*\s]*explanation[*\s]*:[*\s]*(.*)$/i, 'explanation'],
  [/^[#*\s]*time complexity[*\s]*:[*\s]*(.*)$/i, 'timeComplexity'],
  [/^[#*\s]*space complexity[*\s]*:[*\s]*(.*)$/i, 'spaceComplexity'],
  [/^[#*\s]*approach[*\s]*:[*\s]*(.*)$/i, 'approach']
];

const FENCE_ALIASES: Partial<Record<Language, string[]>> = {
  cpp: ['c++', 'cc', 'cxx'],
  javascript: ['js'],
  python: ['py', 'python3'],
  go: ['golang'],
  rust: ['rs']
};

const FENCE_PATTERN = /```([\w+#-]*)[ \t]*\r?\n([\s\S]*?)```/g;

interface FencedBlock {
  tag: string;
  body: string;
}

function findFencedBlocks(text: string): FencedBlock[] {
  return Array.from(text.matchAll(FENCE_PATTERN), match => ({
    tag: (match[1] ?? '').toLowerCase(),
    body: (match[2] ?? '').replace(/\s+$/, '')
  }));
}

/**
 * Code from the first fenced block tagged with `language`, else the first fenced block
 */
export function extractCodeBlock(text: string, language?: Language): string | null {
  const blocks = findFencedBlocks(text);
  if (blocks.length === 0) {
    return null;
  }

  if (language) {
    const tags = [LANGUAGE_PROFILES[language].fence, language, ...(FENCE_ALIASES[language] ?? [])];
    const tagged = blocks.find(block => tags.includes(block.tag));
    if (tagged) {
      return tagged.body;
    }
  }
  return blocks[0].body;
}

function matchHeader(line: string): [SectionKey, string] | null {
  for (const [pattern, key] of SECTION_HEADERS) {
    const match = pattern.exec(line);
    if (match) {
      return [key, match[1] ?? ''];
    }
  }
  return null;
}

/**
 * Split a model response into solution sections.
 *
 * Headers are matched at line start, case-insensitively; text on the header line
 * belongs to its section. Without any header the first fenced block is the code and
 * the remaining text is the explanation.
 */
export function parseSolutionResponse(content: string, language: Language): ParsedSolution {
  const sections: Record<SectionKey, string[]> = {
    code: [],
    explanation: [],
    timeComplexity: [],
    spaceComplexity: [],
    approach: []
  };

  let current: SectionKey | null = null;
  let inFence = false;
  for (const line of content.split(/\r?\n/)) {
    if (line.trimStart().startsWith('```')) {
      inFence = !inFence;
    }

    const header = inFence ? null : matchHeader(line);
    if (header) {
      current = header[0];
      if (header[1].trim()) {
        sections[current].push(header[1]);
      }
      continue;
    }
    if (current) {
      sections[current].push(line);
    }
  }

  const text = (key: SectionKey): string => sections[key].join('\n').trim();
  const hasSections = Object.values(sections).some(lines => lines.length > 0);

  if (!hasSections) {
    return {
      code: extractCodeBlock(content, language) ?? '',
      explanation: content.replace(FENCE_PATTERN, '').trim(),
      timeComplexity: '',
      spaceComplexity: '',
      approach: ''
    };
  }

  const solutionText = text('code');
  const code = extractCodeBlock(solutionText, language) ?? (solutionText || extractCodeBlock(content, language) || '');

  return {
    code: code.replace(/^(?:[ \t]*\r?\n)+/, '').trimEnd(),
    explanation: text('explanation'),
    timeComplexity: text('timeComplexity'),
    spaceComplexity: text('spaceComplexity'),
    approach: text('approach')
  };
}
