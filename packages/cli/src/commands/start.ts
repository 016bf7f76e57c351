import { Command } from 'commander';
import { setDefaultResultOrder } from 'node:dns';
import { createGateway, loadConfig, tokenVariable } from '@chatbridge/core';
import { startServer } from '@chatbridge/server';
import { logger } from '../utils/logger.js';

interface StartOptions {
  port?: string;
  host?: string;
  config?: string;
}

export const startCommand = new Command('start')
  .description('Start the chatbridge gateway server')
  .option('-p, --port <port>', 'Port to listen on')
  .option('-H, --host <host>', 'Host to bind to')
  .option('-c, --config <path>', 'Path to config file')
  .action((options: StartOptions) => {
    logger.banner();

    try {
      // Prefer IPv4 in environments where IPv6 is unreachable
      setDefaultResultOrder('ipv4first');

      logger.info('Loading configuration...');
      const config = loadConfig(options.config);

      if (options.port) {
        const port = Number.parseInt(options.port, 10);
        if (!Number.isInteger(port) || port <= 0 || port > 65535) {
          throw new Error(`Invalid port: ${options.port}`);
        }
        config.server.port = port;
      }
      if (options.host) {
        config.server.host = options.host;
      }

      const gateway = createGateway(config, { logger });
      const providers = gateway.registry.list();
      if (providers.length > 0) {
        logger.info(`Configured providers: ${providers.map((p) => p.name).join(', ')}`);
      } else {
        logger.warn('No providers configured. Add tokens to enable providers.');
        logger.dim(`  Example: ${tokenVariable('deepseek')}=... or providers.deepseek.token in chatbridge.yaml`);
      }
      logger.dim(`  ${gateway.registry.listModels().length} models available`);

      const server = startServer({ config, gateway, logger });

      logger.success(`Server running at http://${config.server.host}:${config.server.port}`);
      logger.dim('Press Ctrl+C to stop');

      process.once('SIGINT', () => {
        logger.info('Shutting down...');
        server.close();
      });
    } catch (err) {
      logger.error(`Failed to start: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });
