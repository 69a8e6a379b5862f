export const MAX_OUTPUT_TOKENS = 8192;

// Responses are not stored, so reasoning is carried forward in encrypted form
export const RESPONSE_INCLUDE = ['reasoning.encrypted_content'] as const;
