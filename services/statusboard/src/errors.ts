import { ZodError } from 'zod';
import { TemplateRenderError } from '@statusboard/core';

export interface ErrorResponse {
  statusCode: number;
  message: string;
  details?: unknown;
}

export class PageAssetError extends Error {
  readonly code = 'PAGE_ASSET_UNAVAILABLE';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PageAssetError';
  }
}

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
  if (error instanceof TemplateRenderError || error instanceof PageAssetError) {
    return {
      statusCode: 500,
      message: 'Failed to generate page'
    };
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      message: 'Request validation failed',
      details: error.flatten()
    };
  }

  return {
    statusCode: 500,
    message: 'Unexpected error'
  };
};
