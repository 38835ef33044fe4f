import { ConfigManager } from '@/config';
import { GatewayServer } from '@/services/server';
import { Logger } from '@/utils/logger';
import { errorMessage } from '@/utils/errors';

async function main(): Promise<void> {
	let configManager: ConfigManager;
	try {
		configManager = ConfigManager.getInstance();
	} catch (err) {
		// No logger yet: its level comes from the configuration that failed
		console.error(`Failed to load configuration: ${errorMessage(err)}`);
		process.exit(1);
	}

	const config = configManager.getConfig();
	const logger = Logger.getInstance(config);
	const server = new GatewayServer(config, { logger });

	logger.info('Starting DIVI RPC gateway', {
		upstream: `${config.rpc.host}:${config.rpc.port}`,
		confPath: config.rpc.confPath ?? null,
		peerCacheTtlMs: config.cache.peerTtlMs,
	});
	await server.start();

	const shutdown = (signal: string): void => {
		logger.info('Shutting down', { signal });
		server
			.stop()
			.then(() => process.exit(0))
			.catch((err: unknown) => {
				logger.error('Error during shutdown', { error: errorMessage(err) });
				process.exit(1);
			});
	};

	process.once('SIGINT', () => shutdown('SIGINT'));
	process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
	console.error(`Gateway failed to start: ${errorMessage(err)}`);
	process.exit(1);
});
