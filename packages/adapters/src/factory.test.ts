import { describe, it, expect } from 'vitest';
import { ProviderConfigSchema } from '@constify/shared';
import { createRewriteAdapter } from './factory';
import { FakeRewriteAdapter } from './fake/adapter';
import { OpenAIRewriteAdapter } from './openai/adapter';

describe('createRewriteAdapter', () => {
  it('builds the OpenAI-compatible adapter by default', () => {
    const adapter = createRewriteAdapter(ProviderConfigSchema.parse({}), {});
    expect(adapter).toBeInstanceOf(OpenAIRewriteAdapter);
    expect(adapter.id()).toBe('openai');
  });

  it('builds the fake adapter', () => {
    const adapter = createRewriteAdapter(ProviderConfigSchema.parse({ type: 'fake' }), {});
    expect(adapter).toBeInstanceOf(FakeRewriteAdapter);
  });
});
