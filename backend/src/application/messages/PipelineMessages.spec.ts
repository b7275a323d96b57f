import { MalformedMessageError } from '../../domain/errors';
import {
  ExtractedContentPayload,
  SubmittedJobPayload,
  parseMessage,
  parseResultMessage,
  peekJobId,
} from './PipelineMessages';

describe('PipelineMessages', () => {
  describe('parseMessage', () => {
    it('should accept a valid stage-1 payload', () => {
      const message = parseMessage(SubmittedJobPayload, { id: 'job-1', repositoryReference: 'https://github.com/a/b' });

      expect(message.id).toBe('job-1');
      expect(message.repositoryReference).toBe('https://github.com/a/b');
    });

    it('should reject a payload without an id', () => {
      expect(() => parseMessage(SubmittedJobPayload, { repositoryReference: 'https://github.com/a/b' })).toThrow(
        MalformedMessageError,
      );
    });

    it('should reject payloads that are not objects', () => {
      expect(() => parseMessage(SubmittedJobPayload, 'not json')).toThrow(
        'Expected a JSON object payload, got string',
      );
      expect(() => parseMessage(SubmittedJobPayload, [])).toThrow('Expected a JSON object payload, got array');
    });

    it('should validate nested summary parameters', () => {
      expect(() =>
        parseMessage(ExtractedContentPayload, {
          id: 'job-1',
          extractedContent: 'README',
          parameters: { language: 'xx', length: 'short', technicality: 'expert' },
        }),
      ).toThrow(/parameters\.language/);
    });
  });

  describe('parseResultMessage', () => {
    it('should parse a completed result', () => {
      expect(parseResultMessage({ id: 'job-1', status: 'completed', summaryContent: '<p>ok</p>' })).toEqual({
        id: 'job-1',
        status: 'completed',
        summaryContent: '<p>ok</p>',
      });
    });

    it('should parse a failed result', () => {
      expect(parseResultMessage({ id: 'job-1', status: 'failed', errorMessage: 'timeout' })).toEqual({
        id: 'job-1',
        status: 'failed',
        errorMessage: 'timeout',
      });
    });

    it('should reject a completed result without a summary', () => {
      expect(() => parseResultMessage({ id: 'job-1', status: 'completed', summaryContent: '' })).toThrow(
        MalformedMessageError,
      );
    });

    it('should reject an unknown status', () => {
      expect(() => parseResultMessage({ id: 'job-1', status: 'analyzing' })).toThrow(MalformedMessageError);
    });
  });

  describe('peekJobId', () => {
    it('should read a string id', () => {
      expect(peekJobId({ id: 'job-1' })).toBe('job-1');
    });

    it('should return null when there is no usable id', () => {
      expect(peekJobId({ id: 42 })).toBeNull();
      expect(peekJobId('job-1')).toBeNull();
      expect(peekJobId(null)).toBeNull();
    });
  });
});
