import { ConfigService } from './config.service';

describe('ConfigService', () => {
  const config = new ConfigService({
    GRADING_SYSTEM: 'CBC',
    SUBJECT_MAX_SCALE: '50',
    BAD_NUMBER: 'fifty',
    BLANK: ' ',
    SECONDARY_GRADING_SYSTEMS: 'PERCENTAGE, LETTER,,',
  });

  it('returns required values and fails loudly on missing ones', () => {
    expect(config.get('GRADING_SYSTEM')).toBe('CBC');
    expect(() => config.get('DB_HOST')).toThrow('Configuration error: Missing required environment variable DB_HOST');
  });

  it('falls back for optional values', () => {
    expect(config.getOptional('DB_HOST', 'localhost')).toBe('localhost');
    expect(config.getOptional('GRADING_SYSTEM', 'LETTER')).toBe('CBC');
  });

  it('parses numbers', () => {
    expect(config.getNumber('SUBJECT_MAX_SCALE', 100)).toBe(50);
    expect(config.getNumber('MISSING', 100)).toBe(100);
    expect(config.getNumber('BLANK', 100)).toBe(100);
    expect(() => config.getNumber('BAD_NUMBER', 100)).toThrow("Configuration error: BAD_NUMBER must be a number, got 'fifty'");
  });

  it('splits lists and drops blanks', () => {
    expect(config.getList('SECONDARY_GRADING_SYSTEMS')).toEqual(['PERCENTAGE', 'LETTER']);
    expect(config.getList('MISSING')).toEqual([]);
  });
});
