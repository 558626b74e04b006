export * from './HttpInferenceGateway';
export * from './InferenceResponse.dto';
