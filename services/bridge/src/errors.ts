import { ZodError } from 'zod';

export interface ErrorResponse {
  statusCode: number;
  message: string;
  details?: unknown;
}

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
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
