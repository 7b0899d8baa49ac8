import { NextFunction, Request, Response } from 'express';
import { handleError } from '../utils/errorHandler.js';

interface BodyParserError extends Error {
    type?: string;
    status?: number;
}

function isBodyParserError(error: unknown): error is BodyParserError {
    return error instanceof Error && 'type' in error;
}

export const notFound = (_req: Request, res: Response) => {
    res.status(404).json({ error: 'Route not found' });
};

// Express only treats four-argument middleware as an error handler
export const errorMiddleware = (error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParserError(error) && error.type === 'entity.parse.failed') {
        return res.status(400).json({ error: 'Request body must be valid JSON' });
    }
    if (isBodyParserError(error) && error.status !== undefined && error.status < 500) {
        return res.status(error.status).json({ error: error.message });
    }
    return handleError(res, error);
};
