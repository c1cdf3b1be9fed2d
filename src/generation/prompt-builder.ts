/**
 * Prompts for the Solve and Embellish stages
 */

import type { ChatMessage } from './interface';
import type { ProblemPayload, Solution } from '../delivery/types';
import { LANGUAGE_PROFILES, Language } from '../system/config/languages';

export const SOLUTION_SYSTEM_PROMPT =
  'You are an expert software engineer and competitive programmer. ' +
  'Provide clear, efficient, and well-commented solutions to coding problems.';

export const COMMENTARY_SYSTEM_PROMPT =
  'You are a witty senior engineer who writes short, good-natured jokes about code. ' +
  'Keep every line under 120 characters and never explain the joke.';

function formatExamples(problem: ProblemPayload): string {
  if (problem.examples.length === 0) {
    return '(none given)';
  }
  return problem.examples
    .map((example, index) => {
      const lines = [`Example ${index + 1}:`, `Input: ${example.input}`, `Output: ${example.output}`];
      if (example.explanation) {
        lines.push(`Explanation: ${example.explanation}`);
      }
      return lines.join('\n');
    })
    .join('\n\n');
}

function formatList(items: string[]): string {
  return items.length > 0 ? items.map(item => `- ${item}`).join('\n') : '(none given)';
}

/**
 * Messages asking for a solution in the sectioned layout the response parser reads
 */
export function buildSolutionMessages(problem: ProblemPayload, language: Language): ChatMessage[] {
  const profile = LANGUAGE_PROFILES[language];
  const name = profile.displayName;

  const user = `Please solve the following coding problem in ${name}.

PROBLEM TITLE: ${problem.title}
DIFFICULTY: ${problem.difficulty}

PROBLEM DESCRIPTION:
${problem.description}

CONSTRAINTS:
${formatList(problem.constraints)}

EXAMPLES:
${formatExamples(problem)}

REQUIREMENTS:
1. Provide a complete, working solution in ${name}
2. Include comments explaining the approach
3. Analyze time and space complexity
4. Handle the edge cases implied by the constraints

Structure your response exactly as follows:

SOLUTION:
\`\`\`${profile.fence}
[complete solution code]
\`\`\`

EXPLANATION:
[how the algorithm works]

TIME COMPLEXITY:
[Big O time complexity]

SPACE COMPLEXITY:
[Big O space complexity]

APPROACH:
[step-by-step breakdown]`;

  return [
    { role: 'system', content: SOLUTION_SYSTEM_PROMPT },
    { role: 'user', content: user }
  ];
}

/**
 * Messages asking for two or three one-line jokes about a solution
 */
export function buildCommentaryMessages(problem: ProblemPayload, solution: Solution): ChatMessage[] {
  const profile = LANGUAGE_PROFILES[solution.language];

  const user = `Here is a ${profile.displayName} solution to "${problem.title}" (${problem.difficulty}).

\`\`\`${profile.fence}
${solution.code}
\`\`\`

Approach: ${solution.approach || solution.explanation}

Write 2 or 3 short, funny one-line comments about this solution.
Reply with one comment per line and nothing else. Do not number them or add comment markers.`;

  return [
    { role: 'system', content: COMMENTARY_SYSTEM_PROMPT },
    { role: 'user', content: user }
  ];
}
