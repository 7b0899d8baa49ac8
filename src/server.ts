import dotenv from "dotenv";
import { createApp } from "./app.js";
import { loadConfig, vectorFilePath } from "./config/appConfig.js";
import { ensureVectorFile } from "./services/vectorBootstrap.js";
import { loadVectorFile } from "./services/vectorLoader.js";
import { logger } from "./utils/logger.js";

// Load environment variables
dotenv.config();

async function main(): Promise<void> {
    const config = loadConfig(process.env);
    logger.setLevel(config.logLevel);

    if (config.autoDownload) {
        const bootstrap = await ensureVectorFile(config);
        if (!bootstrap.ok) {
            logger.error(bootstrap.message);
            process.exit(1);
        }
    }

    const loaded = await loadVectorFile(vectorFilePath(config));
    if (!loaded.ok) {
        logger.error(loaded.error.message);
        process.exit(1);
    }

    const app = createApp(loaded.table, config);
    const server = app.listen(config.port, () => {
        logger.info(`Server running on http://localhost:${config.port}`);
    });

    server.on("error", (e: NodeJS.ErrnoException) => {
        if (e.code === "EADDRINUSE") {
            logger.error(`Port ${config.port} is already in use`);
        } else {
            logger.error("Server error:", e);
        }
        process.exit(1);
    });
}

main().catch((error: unknown) => {
    logger.error("Startup failed", error);
    process.exit(1);
});
