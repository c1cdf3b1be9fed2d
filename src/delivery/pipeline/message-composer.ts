/**
 * Builds the outgoing email for a delivered problem and the subscription notices.
 */

import { LANGUAGE_PROFILES } from '../../system/config/languages';
import type { Language } from '../../system/config/languages';
import type { Difficulty, DifficultyPreference } from '../../db/types';
import { NotificationTemplate } from '../../system/notification';
import type { Embellishment, OutgoingMessage, ProblemPayload, Solution } from '../types';

export const DIFFICULTY_EMOJI: Record<Difficulty, string> = {
  easy: '🟢',
  medium: '🟡',
  hard: '🔴'
};

const SUBJECT_TEMPLATE = '{{emoji}} Daily Coding Challenge: {{title}} ({{date}})';
const MAX_HINTS = 2;

export interface ComposeInput {
  to: string;
  asOf: Date;
  timezone: string;
  payload: ProblemPayload;
  solution: Solution;
  embellishment: Embellishment | null;
}

/**
 * Calendar date of `date` in `timezone`, formatted YYYY-MM-DD.
 */
export function formatDeliveryDate(date: Date, timezone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string => parts.find(p => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

export function composeSubject(payload: ProblemPayload, asOf: Date, timezone: string): string {
  return NotificationTemplate.create(SUBJECT_TEMPLATE)
    .setVariables({
      emoji: DIFFICULTY_EMOJI[payload.difficulty],
      title: payload.title,
      date: formatDeliveryDate(asOf, timezone)
    })
    .render();
}

export function composeDeliveryMessage(input: ComposeInput): OutgoingMessage {
  const { payload, solution, embellishment } = input;
  const language = LANGUAGE_PROFILES[solution.language];
  const lines: string[] = [];

  lines.push(`${payload.title} (${capitalize(payload.difficulty)})`);
  if (payload.tags.length > 0) {
    lines.push(`Tags: ${payload.tags.join(', ')}`);
  }
  lines.push('', 'PROBLEM', payload.description.trim());

  if (payload.examples.length > 0) {
    lines.push('', 'EXAMPLES');
    payload.examples.forEach((example, index) => {
      lines.push(`Example ${index + 1}:`, `  Input: ${example.input}`, `  Output: ${example.output}`);
      if (example.explanation) {
        lines.push(`  Explanation: ${example.explanation}`);
      }
    });
  }

  if (payload.constraints.length > 0) {
    lines.push('', 'CONSTRAINTS', ...payload.constraints.map(constraint => `- ${constraint}`));
  }

  const hints = payload.hints.slice(0, MAX_HINTS);
  if (hints.length > 0) {
    lines.push('', 'HINTS', ...hints.map((hint, index) => `${index + 1}. ${hint}`));
  }

  lines.push('', `SOLUTION (${language.displayName})`, embellishment ? embellishment.annotatedCode : solution.code);

  if (solution.explanation) {
    lines.push('', 'EXPLANATION', solution.explanation);
  }
  if (solution.approach) {
    lines.push('', 'APPROACH', solution.approach);
  }
  if (solution.timeComplexity || solution.spaceComplexity) {
    lines.push('', 'COMPLEXITY');
    if (solution.timeComplexity) lines.push(`Time: ${solution.timeComplexity}`);
    if (solution.spaceComplexity) lines.push(`Space: ${solution.spaceComplexity}`);
  }

  if (embellishment && embellishment.commentary.length > 0) {
    lines.push('', 'FROM THE PEANUT GALLERY', ...embellishment.commentary.map(line => `* ${line}`));
  }

  lines.push('', '--', 'You receive this because you subscribed to daily coding challenges.', 'Reply "unsubscribe" to stop.');

  return {
    to: input.to,
    subject: composeSubject(payload, input.asOf, input.timezone),
    text: lines.join('\n')
  };
}

export function composeWelcomeMessage(to: string, language: Language, difficulty: DifficultyPreference): OutgoingMessage {
  const difficultyText = difficulty === 'any' ? 'problem of any difficulty' : `${difficulty} problem`;
  return {
    to,
    subject: 'Welcome to Daily Coding Challenges',
    text: [
      'You are subscribed.',
      '',
      `Every day you will receive one ${difficultyText} with a solution in ${LANGUAGE_PROFILES[language].displayName}.`,
      'You will never receive the same problem twice.'
    ].join('\n')
  };
}

export function composeUnsubscribeMessage(to: string): OutgoingMessage {
  return {
    to,
    subject: 'Unsubscribed from Daily Coding Challenges',
    text: [
      'You will no longer receive daily problems.',
      'Your delivery history is kept, so if you subscribe again you will not see repeats.'
    ].join('\n')
  };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
