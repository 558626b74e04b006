import { ConfidenceScore } from './ConfidenceScore';

describe('ConfidenceScore', () => {
  it('should create a valid score', () => {
    expect(ConfidenceScore.create(87.5).value).toBe(87.5);
  });

  it('should round to 2 decimal places', () => {
    expect(ConfidenceScore.create(66.666).value).toBe(66.67);
  });

  it('should accept the bounds', () => {
    expect(ConfidenceScore.create(0).value).toBe(0);
    expect(ConfidenceScore.create(100).value).toBe(100);
  });

  it('should throw outside 0-100', () => {
    expect(() => ConfidenceScore.create(-1)).toThrow('Confidence score must be between 0 and 100, got -1');
    expect(() => ConfidenceScore.create(100.5)).toThrow('Confidence score must be between 0 and 100');
  });

  it('should throw for NaN', () => {
    expect(() => ConfidenceScore.create(NaN)).toThrow('Confidence score must be a finite number');
  });

  it('should compare against a threshold', () => {
    expect(ConfidenceScore.create(70).isAtLeast(70)).toBe(true);
    expect(ConfidenceScore.create(69.99).isAtLeast(70)).toBe(false);
  });
});
