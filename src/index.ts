#!/usr/bin/env node
import dotenv from "dotenv";
dotenv.config();
import { createArgumentParser, parseArguments, resolveConfig, type CliArguments, type ProxyConfig } from "./config";
import { FileCacheStore } from "./cache/store";
import { ConfigError, errorMessage } from "./errors";
import { createLogger } from "./logger";
import { HttpOriginClient } from "./origin/client";
import { ProxyServer } from "./server/listener";
import { TunnelRelay } from "./tunnel/relay";

async function startServer(config: ProxyConfig): Promise<void> {
    const logger = createLogger(config.logLevel);
    const store = new FileCacheStore({ cacheDir: config.cacheDir });
    await store.init();

    const server = new ProxyServer({
        port: config.port,
        fullProxyMode: config.fullProxyMode,
        origin: config.origin,
        store,
        originClient: new HttpOriginClient({ timeoutMs: config.originTimeoutMs }),
        tunnel: new TunnelRelay({ logger }),
        logger,
    });

    const port = await server.listen();
    logger.info(`Caching proxy server is running on http://localhost:${port}`);
    logger.info(config.fullProxyMode ? "Proxying requests to any origin" : `Forwarding requests to ${config.origin}`);
    logger.info(`Caching responses in ${config.cacheDir}`);

    const shutdown = () => {
        logger.info("Shutting down...");
        server.close().then(
            () => process.exit(0),
            (error: unknown) => {
                logger.error(`Error while closing proxy server: ${errorMessage(error)}`);
                process.exit(1);
            },
        );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
}

async function main(argv: string[]): Promise<number> {
    let args: CliArguments;
    try {
        args = parseArguments(argv);
    } catch (error) {
        if (!(error instanceof ConfigError)) throw error;
        console.error(error.message);
        createArgumentParser([]).showHelp();
        return 1;
    }

    if (args.help) {
        return 0;
    }

    if (args.clearCache) {
        const logger = createLogger(args.logLevel);
        logger.info("Clearing all cached responses...");
        const removed = await new FileCacheStore({ cacheDir: args.cacheDir }).clear();
        logger.info(`Cache cleared successfully (${removed} entries removed).`);
        return 0;
    }

    await startServer(resolveConfig(args));
    return 0;
}

main(process.argv.slice(2)).then(
    (code) => {
        if (code !== 0) process.exit(code);
    },
    (error: unknown) => {
        console.error(`Error while starting proxy server: ${errorMessage(error)}`);
        process.exit(1);
    },
);
