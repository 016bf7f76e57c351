import { z } from 'zod';

export const ModelConfigSchema = z.object({
  id: z.string(),
  alias: z.string().optional(),
  enabled: z.boolean().default(true),
});

const providerFields = {
  enabled: z.boolean().default(true),
  /** Long-lived vendor secret; `<PROVIDER>_TOKEN` in the environment wins over this. */
  token: z.string().optional(),
  baseUrl: z.string().url().optional(),
  /** Replaces the built-in model list when given. */
  models: z.array(ModelConfigSchema).optional(),
};

export const ProviderConfigSchema = z.object(providerFields);

export const DeepSeekConfigSchema = z.object({
  ...providerFields,
  pow: z
    .object({
      hash: z.string().default('sha3-256'),
      maxAttempts: z.number().int().positive().default(10_000_000),
      batchSize: z.number().int().positive().default(5000),
    })
    .default({}),
});

export const KimiConfigSchema = z.object({
  ...providerFields,
  transport: z.enum(['http', 'websocket']).default('http'),
  /** Socket endpoint used when `transport` is `websocket`; derived from `baseUrl` when absent. */
  websocketUrl: z.string().url().optional(),
});

export const MetasoConfigSchema = z.object(providerFields);

export const DoubaoConfigSchema = z.object({
  ...providerFields,
  botId: z.string().default('7338286299411103781'),
});

export const QwenConfigSchema = z.object(providerFields);

export const ZhipuConfigSchema = z.object({
  ...providerFields,
  assistantId: z.string().default('65940acff94777010aa6b796'),
  signSecret: z.string().default('8a1317a7468aa3ad86e997d08f3f31cb'),
  accessTokenTtlSeconds: z.number().int().positive().default(3600),
  /** Delete the vendor-side conversation once a reply is complete. */
  deleteConversations: z.boolean().default(true),
});

export const MinimaxConfigSchema = z.object({
  ...providerFields,
  signatureSecret: z.string().default('I*7Cf%WZ#S&%1RlZJ&C2'),
  yySuffix: z.string().default('ooui'),
  pollIntervalMs: z.number().int().positive().default(500),
  maxWaitMs: z.number().int().positive().default(120_000),
});

export const ProvidersConfigSchema = z.object({
  deepseek: DeepSeekConfigSchema.default({}),
  kimi: KimiConfigSchema.default({}),
  metaso: MetasoConfigSchema.default({}),
  doubao: DoubaoConfigSchema.default({}),
  qwen: QwenConfigSchema.default({}),
  zhipu: ZhipuConfigSchema.default({}),
  minimax: MinimaxConfigSchema.default({}),
});

export const ServerConfigSchema = z.object({
  port: z.number().default(3000),
  host: z.string().default('localhost'),
});

export const GatewayConfigSchema = z.object({
  /** `inline` renders reasoning as `<think:...>` inside content; `field` uses `reasoning_content`. */
  reasoningFormat: z.enum(['inline', 'field']).default('inline'),
  requestTimeoutMs: z.number().int().positive().default(30_000),
  idleTimeoutMs: z.number().int().positive().default(120_000),
  refreshMarginMs: z.number().int().nonnegative().default(60_000),
});

export const ConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  gateway: GatewayConfigSchema.default({}),
  providers: ProvidersConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type ProvidersConfig = z.infer<typeof ProvidersConfigSchema>;
export type ProviderId = keyof ProvidersConfig;
export type ProviderSettings = z.infer<typeof ProviderConfigSchema>;
export type DeepSeekSettings = z.infer<typeof DeepSeekConfigSchema>;
export type KimiSettings = z.infer<typeof KimiConfigSchema>;
export type MetasoSettings = z.infer<typeof MetasoConfigSchema>;
export type DoubaoSettings = z.infer<typeof DoubaoConfigSchema>;
export type QwenSettings = z.infer<typeof QwenConfigSchema>;
export type ZhipuSettings = z.infer<typeof ZhipuConfigSchema>;
export type MinimaxSettings = z.infer<typeof MinimaxConfigSchema>;

export const PROVIDER_IDS = [
  'deepseek',
  'kimi',
  'metaso',
  'doubao',
  'qwen',
  'zhipu',
  'minimax',
] as const satisfies readonly ProviderId[];
