import type {
  SummaryLanguage,
  SummaryLength,
  SummaryParametersDto,
  Technicality,
} from '@repo-digest/shared';
import { ValidationError } from '../errors';

export const SUMMARY_LANGUAGES = [
  'en', 'es', 'fr', 'de', 'it', 'pt', 'nl', 'ja', 'zh', 'ko', 'ru',
] as const satisfies readonly SummaryLanguage[];

export const SUMMARY_LENGTHS = ['short', 'medium', 'long'] as const satisfies readonly SummaryLength[];

export const TECHNICALITY_LEVELS = ['beginner', 'intermediate', 'expert'] as const satisfies readonly Technicality[];

export type SummaryParametersValue = SummaryParametersDto;

export type SummaryParametersInput = Partial<Record<keyof SummaryParametersValue, string>>;

const DEFAULTS: SummaryParametersValue = {
  language: 'en',
  length: 'medium',
  technicality: 'intermediate',
};

function pick<T extends string>(allowed: readonly T[], value: string | undefined, fallback: T, field: string): T {
  if (value === undefined) {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new ValidationError(`Invalid ${field} "${value}". Expected one of: ${allowed.join(', ')}`);
  }
  return match;
}

/**
 * Value Object holding the summarization configuration of a job.
 * Immutable once the job is created.
 */
export class SummaryParameters {
  private constructor(private readonly _value: SummaryParametersValue) {}

  static create(input: SummaryParametersInput = {}): SummaryParameters {
    return new SummaryParameters({
      language: pick(SUMMARY_LANGUAGES, input.language, DEFAULTS.language, 'language'),
      length: pick(SUMMARY_LENGTHS, input.length, DEFAULTS.length, 'length'),
      technicality: pick(TECHNICALITY_LEVELS, input.technicality, DEFAULTS.technicality, 'technicality'),
    });
  }

  static defaults(): SummaryParameters {
    return new SummaryParameters({ ...DEFAULTS });
  }

  get language(): SummaryLanguage {
    return this._value.language;
  }

  get length(): SummaryLength {
    return this._value.length;
  }

  get technicality(): Technicality {
    return this._value.technicality;
  }

  toJSON(): SummaryParametersValue {
    return { ...this._value };
  }

  equals(other: SummaryParameters): boolean {
    return (
      this.language === other.language &&
      this.length === other.length &&
      this.technicality === other.technicality
    );
  }
}
