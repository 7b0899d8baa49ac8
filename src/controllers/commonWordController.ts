import { Request, Response } from 'express';
import { parseFindCommonWordRequest } from '../schemas/findCommonWordSchema.js';
import { CommonWordService } from '../services/commonWordService.js';
import { handleError } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

export class CommonWordController {
    constructor(
        private readonly commonWordService: CommonWordService,
        private readonly defaultTopN: number = 5
    ) {}

    // Arrow properties so the handlers keep `this` when passed to the router
    findCommonWord = (req: Request, res: Response) => {
        const parsed = parseFindCommonWordRequest(req.body);
        if (!parsed.success) {
            return res.status(400).json({ error: parsed.message });
        }

        const { words, top_n: topN = this.defaultTopN } = parsed.data;
        try {
            logger.debug('Finding common words', { words, topN });
            const result = this.commonWordService.findCommonWords(words, topN);
            return res.json(result);
        } catch (error) {
            return handleError(res, error);
        }
    };

    health = (_req: Request, res: Response) => {
        res.json({ status: 'ok', ...this.commonWordService.getVocabularyInfo() });
    };
}
