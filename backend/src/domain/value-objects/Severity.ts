export type Severity = 'critical' | 'moderate' | 'minor';

export const SEVERITIES: readonly Severity[] = ['critical', 'moderate', 'minor'];

export function isSeverity(value: string): value is Severity {
  return SEVERITIES.some(severity => severity === value);
}

export function parseSeverity(value: string): Severity {
  if (!isSeverity(value)) {
    throw new Error(`Invalid severity: ${value}`);
  }
  return value;
}
