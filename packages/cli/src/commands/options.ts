import { InvalidArgumentError } from 'commander';
import type { SummaryLanguage, SummaryLength, Technicality } from '@repo-digest/shared';

export const LANGUAGES = [
  'en', 'es', 'fr', 'de', 'it', 'pt', 'nl', 'ja', 'zh', 'ko', 'ru',
] as const satisfies readonly SummaryLanguage[];
export const LENGTHS = ['short', 'medium', 'long'] as const satisfies readonly SummaryLength[];
export const TECHNICALITIES = ['beginner', 'intermediate', 'expert'] as const satisfies readonly Technicality[];

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}
