/**
 * Value Object representing the model's confidence in a suggestion (0-100)
 * Immutable and self-validating
 */
export class ConfidenceScore {
  private readonly _value: number;

  private constructor(value: number) {
    this._value = value;
  }

  static create(value: number): ConfidenceScore {
    if (!Number.isFinite(value)) {
      throw new Error('Confidence score must be a finite number');
    }
    if (value < 0 || value > 100) {
      throw new Error(`Confidence score must be between 0 and 100, got ${value}`);
    }
    return new ConfidenceScore(Math.round(value * 100) / 100); // Round to 2 decimals
  }

  get value(): number {
    return this._value;
  }

  isAtLeast(threshold: number): boolean {
    return this._value >= threshold;
  }

  equals(other: ConfidenceScore): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return `${this._value}%`;
  }
}
