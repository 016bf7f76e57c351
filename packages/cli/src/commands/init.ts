import { Command } from 'commander';
import { writeFileSync, existsSync } from 'fs';
import { logger } from '../utils/logger.js';

export const DEFAULT_CONFIG = `# chatbridge configuration
server:
  port: 3000
  host: localhost

gateway:
  # inline: reasoning arrives in content as <think:...>; field: in reasoning_content
  reasoningFormat: inline
  requestTimeoutMs: 30000
  idleTimeoutMs: 120000

# Each provider needs a token copied from a signed-in browser session.
# <PROVIDER>_TOKEN environment variables (e.g. DEEPSEEK_TOKEN) take precedence.
providers:
  deepseek:
    enabled: true
    # token: ...           # userToken from local storage
  kimi:
    enabled: true
    # token: ...           # access_token (JWT)
    # transport: websocket
  metaso:
    enabled: true
    # token: uid-sid       # uid and sid cookies joined by "-"
  doubao:
    enabled: true
    # token: ...           # sessionid cookie
  qwen:
    enabled: true
    # token: ...           # tongyi_sso_ticket, or the whole cookie string
  zhipu:
    enabled: true
    # token: ...           # chatglm_refresh_token cookie
  minimax:
    enabled: true
    # token: ...           # _token from local storage (JWT)
`;

export const initCommand = new Command('init')
  .description('Initialize a new chatbridge configuration file')
  .option('-f, --force', 'Overwrite existing config file')
  .action((options: { force?: boolean }) => {
    const configPath = './chatbridge.yaml';

    if (existsSync(configPath) && !options.force) {
      logger.error(`Config file already exists: ${configPath}`);
      logger.dim('Use --force to overwrite');
      process.exit(1);
    }

    writeFileSync(configPath, DEFAULT_CONFIG, 'utf-8');
    logger.success(`Created config file: ${configPath}`);
    logger.dim('Add a token for each provider you want to use');
  });
