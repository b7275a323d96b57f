import { SummaryParameters } from './SummaryParameters';
import { ValidationError } from '../errors';

describe('SummaryParameters', () => {
  describe('create', () => {
    it('should accept a full valid configuration', () => {
      const parameters = SummaryParameters.create({
        language: 'fr',
        length: 'long',
        technicality: 'expert',
      });

      expect(parameters.toJSON()).toEqual({ language: 'fr', length: 'long', technicality: 'expert' });
    });

    it('should fill in defaults for omitted fields', () => {
      const parameters = SummaryParameters.create({ length: 'short' });

      expect(parameters.language).toBe('en');
      expect(parameters.length).toBe('short');
      expect(parameters.technicality).toBe('intermediate');
    });

    it('should reject unknown values', () => {
      expect(() => SummaryParameters.create({ technicality: 'wizard' })).toThrow(ValidationError);
      expect(() => SummaryParameters.create({ language: 'klingon' })).toThrow(
        'Invalid language "klingon". Expected one of: en, es, fr, de, it, pt, nl, ja, zh, ko, ru',
      );
    });
  });

  describe('toJSON', () => {
    it('should return a copy that does not leak internal state', () => {
      const parameters = SummaryParameters.defaults();
      const json = parameters.toJSON();
      json.language = 'de';

      expect(parameters.language).toBe('en');
    });
  });

  describe('equals', () => {
    it('should compare by value', () => {
      expect(SummaryParameters.create({}).equals(SummaryParameters.defaults())).toBe(true);
      expect(SummaryParameters.create({ length: 'long' }).equals(SummaryParameters.defaults())).toBe(false);
    });
  });
});
