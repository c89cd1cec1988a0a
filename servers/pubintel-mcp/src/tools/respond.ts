import { InputError, errorMessage } from '@pubintel/core';

export interface ToolResponse {
  [key: string]: unknown;
  content: { type: 'text'; text: string }[];
  isError?: boolean;
}

export function jsonContent(value: unknown): ToolResponse {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(value, null, 2)
      }
    ]
  };
}

export function errorContent(error: unknown): ToolResponse {
  const payload = error instanceof InputError
    ? { error: 'INVALID_INPUT', message: error.message }
    : { error: 'ANALYSIS_FAILED', message: errorMessage(error) };

  if (!(error instanceof InputError)) {
    console.error('[pubintel-mcp] analysis failed', error);
  }

  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(payload, null, 2)
      }
    ],
    isError: true
  };
}

export function today(): string {
  return new Date().toISOString().slice(0, 10);
}
