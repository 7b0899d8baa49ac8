// src/utils/errorHandler.ts
import { Response } from 'express';
import { logger } from './logger.js';

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code?: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export const handleError = (res: Response, error: unknown) => {
  if (error instanceof AppError) {
    return res.status(error.statusCode).json({ 
      error: error.message,
      code: error.code,
      details: error.details
    });
  }
  
  logger.error('Unhandled error', error);
  const message = error instanceof Error ? error.message : 'Unknown error';
  return res.status(500).json({ error: message });
};
