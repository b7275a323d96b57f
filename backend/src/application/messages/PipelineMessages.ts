import { ClassConstructor, plainToInstance, Type } from 'class-transformer';
import { IsIn, IsNotEmpty, IsString, ValidateIf, ValidateNested, ValidationError, validateSync } from 'class-validator';
import { ExtractedContentMessage, ResultMessage, SubmittedJobMessage } from '../../domain/ports/IBroker';
import {
  SUMMARY_LANGUAGES,
  SUMMARY_LENGTHS,
  SummaryParametersValue,
  TECHNICALITY_LEVELS,
} from '../../domain/value-objects/SummaryParameters';
import { MalformedMessageError } from '../../domain/errors';

/**
 * Validated shapes of the queue payloads. Anything a stage reads from the
 * broker goes through parseMessage first.
 */

export class SubmittedJobPayload implements SubmittedJobMessage {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  repositoryReference!: string;
}

export class SummaryParametersPayload implements SummaryParametersValue {
  @IsIn(SUMMARY_LANGUAGES)
  language!: SummaryParametersValue['language'];

  @IsIn(SUMMARY_LENGTHS)
  length!: SummaryParametersValue['length'];

  @IsIn(TECHNICALITY_LEVELS)
  technicality!: SummaryParametersValue['technicality'];
}

export class ExtractedContentPayload implements ExtractedContentMessage {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  extractedContent!: string;

  @ValidateNested()
  @Type(() => SummaryParametersPayload)
  parameters!: SummaryParametersPayload;
}

export class ResultPayload {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsIn(['completed', 'failed'])
  status!: ResultMessage['status'];

  @ValidateIf((payload: ResultPayload) => payload.status === 'completed')
  @IsString()
  @IsNotEmpty()
  summaryContent?: string;

  @ValidateIf((payload: ResultPayload) => payload.status === 'failed')
  @IsString()
  @IsNotEmpty()
  errorMessage?: string;
}

function flattenErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((constraint) => `${path}: ${constraint}`);
    return [...own, ...flattenErrors(error.children ?? [], path)];
  });
}

/**
 * Read the job id of an untrusted payload, when it has a usable one
 */
export function peekJobId(payload: unknown): string | null {
  if (typeof payload !== 'object' || payload === null) {
    return null;
  }
  const id: unknown = Reflect.get(payload, 'id');
  return typeof id === 'string' && id !== '' ? id : null;
}

export function parseMessage<T extends object>(cls: ClassConstructor<T>, payload: unknown): T {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new MalformedMessageError(`Expected a JSON object payload, got ${Array.isArray(payload) ? 'array' : typeof payload}`);
  }

  const instance = plainToInstance(cls, payload);
  const errors = validateSync(instance);
  if (errors.length > 0) {
    throw new MalformedMessageError(`Invalid ${cls.name}: ${flattenErrors(errors).join('; ')}`);
  }
  return instance;
}

export function parseResultMessage(payload: unknown): ResultMessage {
  const result = parseMessage(ResultPayload, payload);
  if (result.status === 'completed' && result.summaryContent) {
    return { id: result.id, status: 'completed', summaryContent: result.summaryContent };
  }
  if (result.status === 'failed' && result.errorMessage) {
    return { id: result.id, status: 'failed', errorMessage: result.errorMessage };
  }
  throw new MalformedMessageError(`Result for job ${result.id} carries no ${result.status} payload`);
}
