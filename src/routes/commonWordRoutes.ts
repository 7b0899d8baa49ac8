import express from 'express';
import { CommonWordController } from '../controllers/commonWordController.js';

export function createCommonWordRoutes(controller: CommonWordController) {
    const router = express.Router();

    router.post('/find_common_word', controller.findCommonWord);
    router.get('/health', controller.health);

    return router;
}
