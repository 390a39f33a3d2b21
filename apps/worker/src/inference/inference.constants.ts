/** Injection token for the InferenceCapability used by extractors */
export const INFERENCE_CAPABILITY = 'INFERENCE_CAPABILITY';
