import { describe, expect, it } from 'vitest';
import { testConfig } from '../../__tests__/fixtures';
import { createSilentLogger } from '../../obs/logger';
import { loadPipelineContext } from '../context';

describe('loadPipelineContext', () => {
  it('loads the bundled model, lexicon and catalog', async () => {
    const context = await loadPipelineContext(testConfig(), createSilentLogger());
    expect(context.scorer).not.toBeNull();
    expect(context.catalog.pages.length).toBeGreaterThan(0);
  });

  it('starts without a scorer when the model file is missing', async () => {
    const context = await loadPipelineContext(
      testConfig({ MODEL_PATH: 'models/does-not-exist.json' }),
      createSilentLogger(),
    );
    expect(context.scorer).toBeNull();
  });

  it('fails when the lexicon is missing', async () => {
    await expect(
      loadPipelineContext(testConfig({ LEXICON_PATH: 'data/does-not-exist.json5' }), createSilentLogger()),
    ).rejects.toThrow();
  });
});
