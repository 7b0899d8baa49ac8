import express from "express";
import { AppConfig } from "./config/appConfig.js";
import { CommonWordController } from "./controllers/commonWordController.js";
import { errorMiddleware, notFound } from "./middleware/errorMiddleware.js";
import { requestLogger } from "./middleware/requestLogger.js";
import { createCommonWordRoutes } from "./routes/commonWordRoutes.js";
import { CommonWordService } from "./services/commonWordService.js";
import { VectorTable } from "./services/vectorTable.js";

export type AppOptions = Pick<AppConfig, "defaultTopN" | "scanTimeoutMs" | "prettyJson">;

// The table must be fully loaded before this is called; it is shared read-only by every request
export function createApp(table: VectorTable, options: AppOptions) {
    const app = express();

    app.set("json spaces", options.prettyJson ? 2 : 0);

    // Middleware
    app.use(requestLogger);
    app.use(express.json());

    const service = new CommonWordService(table, { scanTimeoutMs: options.scanTimeoutMs });
    const controller = new CommonWordController(service, options.defaultTopN);

    // API Routes
    app.use(createCommonWordRoutes(controller));

    app.use(notFound);
    app.use(errorMiddleware);

    return app;
}
