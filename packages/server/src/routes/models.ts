import { Hono } from 'hono';
import type { IProviderRegistry, OpenAIModelInfo, ProviderModelEntry } from '@chatbridge/core';

interface ModelsContext {
  registry: Pick<IProviderRegistry, 'listModels'>;
  now?: () => number;
}

export function createModelsRoutes(ctx: ModelsContext) {
  const app = new Hono();
  const now = () => Math.floor((ctx.now ?? Date.now)() / 1000);

  const toInfo = ({ model, provider }: ProviderModelEntry): OpenAIModelInfo => ({
    id: model.alias || model.id,
    object: 'model',
    created: now(),
    owned_by: provider.id,
  });

  app.get('/v1/models', (c) => {
    return c.json({
      object: 'list',
      data: ctx.registry.listModels().map(toInfo),
    });
  });

  app.get('/v1/models/:modelId', (c) => {
    const modelId = c.req.param('modelId');
    const found = ctx.registry.listModels().find(({ model }) => model.id === modelId || model.alias === modelId);

    if (!found) {
      return c.json({ error: { message: `Model not found: ${modelId}`, type: 'invalid_request_error', code: 'UnknownModel' } }, 404);
    }

    return c.json(toInfo(found));
  });

  return app;
}
