import { Command } from 'commander';
import { createGateway, loadConfig } from '@chatbridge/core';
import { logger } from '../utils/logger.js';

export const modelsCommand = new Command('models')
  .description('List the models the gateway would serve with the current configuration')
  .option('-c, --config <path>', 'Path to config file')
  .option('--json', 'Print as JSON')
  .action((options: { config?: string; json?: boolean }) => {
    try {
      const { registry } = createGateway(loadConfig(options.config));
      const entries = registry.listModels();

      if (options.json) {
        const rows = entries.map(({ model, provider }) => ({
          id: model.alias || model.id,
          provider: provider.id,
          capabilities: model.capabilities,
        }));
        console.log(JSON.stringify(rows, null, 2));
        return;
      }

      if (entries.length === 0) {
        logger.warn('No models available. Configure a provider token first.');
        return;
      }

      let current = '';
      for (const { model, provider } of entries) {
        if (provider.id !== current) {
          current = provider.id;
          logger.info(`${provider.name} (${provider.transport})`);
        }
        logger.dim(`  ${model.alias || model.id}  [${model.capabilities.join(', ')}]`);
      }
    } catch (err) {
      logger.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
  });
