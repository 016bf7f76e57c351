const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
};

const debugEnabled = Boolean(process.env.CHATBRIDGE_DEBUG);

export const logger = {
  debug: (msg: string, ...details: unknown[]) => {
    if (debugEnabled) console.log(`${colors.dim}. ${msg}${colors.reset}`, ...details);
  },
  info: (msg: string, ...details: unknown[]) => console.log(`${colors.blue}i${colors.reset} ${msg}`, ...details),
  success: (msg: string) => console.log(`${colors.green}+${colors.reset} ${msg}`),
  warn: (msg: string, ...details: unknown[]) => console.log(`${colors.yellow}!${colors.reset} ${msg}`, ...details),
  error: (msg: string, ...details: unknown[]) => console.error(`${colors.red}x${colors.reset} ${msg}`, ...details),
  dim: (msg: string) => console.log(`${colors.dim}${msg}${colors.reset}`),
  banner: () => {
    console.log(`
${colors.cyan}+-----------------------------------+
|       ${colors.bright}chatbridge${colors.reset}${colors.cyan}                  |
|   One API for seven web chats     |
+-----------------------------------+${colors.reset}
`);
  },
};
