import { Severity } from '../value-objects/Severity';

export interface InferenceFile {
  filename: string;
  status: string;
  additions: number;
  deletions: number;
}

export interface InferenceRequest {
  subjectId: string;
  diff: string;
  files: InferenceFile[];
  language: string | null;
}

export interface InferredSuggestion {
  filePath: string;
  lineNumber: number;
  lineEnd: number | null;
  category: string;
  severity: Severity;
  message: string;
  explanation: string;
  suggestedFix: string | null;
  confidenceScore: number;
}

/**
 * Port for the external analysis service. A call either returns the full
 * suggestion list or throws; partial results are never surfaced.
 */
export interface IInferenceGateway {
  analyze(request: InferenceRequest, signal: AbortSignal): Promise<InferredSuggestion[]>;
}

export const INFERENCE_GATEWAY = Symbol('IInferenceGateway');
