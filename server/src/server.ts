import { createApp } from './app.js';
import { loadConfig, loadEnv } from './utils/config.js';
import { DbClient } from './utils/db.js';

const start = async (): Promise<void> => {
    // Load environment variables
    loadEnv();
    const config = loadConfig();

    console.log('Using database path:', config.databasePath);
    console.log('Using media root:', config.mediaRoot);
    const db = await DbClient.open(config.databasePath);

    const app = createApp({ config, db });

    // Start the server
    const server = app.listen(config.port, () => {
        console.log(`Server running on port ${config.port}`);
    });

    const shutdown = (signal: string): void => {
        console.log(`${signal} received, shutting down`);
        server.close(() => {
            db.close()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    console.error('Error closing database:', error);
                    process.exit(1);
                });
        });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
};

start().catch((error: unknown) => {
    console.error('Failed to start server:', error);
    process.exit(1);
});
