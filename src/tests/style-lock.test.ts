import { describe, it, expect } from '@jest/globals';
import { StyleLockManager } from '@/services/style-lock';
import { MemoryArtifactStore } from '@/services/storage';
import { ConcurrencyGate } from '@/shared/concurrency';
import { CharacterLockFailure, StyleLockFailure } from '@/workflows/errors';
import { FakeImageService, pngImage } from './helpers/fakes';
import { FOX_AND_OWL_NAMESPACE, plannedFoxAndOwlProject } from './helpers/fixtures';

const LOCK_CONFIG = { characterLockRetries: 2, retryDelayMs: 0 };

describe('StyleLockManager', () => {
  it('generates the style reference first, then each character once conditioned on it', async () => {
    const images = new FakeImageService();
    const store = new MemoryArtifactStore();
    const manager = new StyleLockManager(images, store, new ConcurrencyGate(3), LOCK_CONFIG);
    const project = plannedFoxAndOwlProject();

    const result = await manager.lock(project, project.characters);

    const styleId = `${FOX_AND_OWL_NAMESPACE}/images/style_reference.png`;
    expect(images.calls[0]?.options.imageType).toBe('style_reference');
    expect(images.callsOfType('style_reference')).toHaveLength(1);
    expect(images.callsOfType('character_reference')).toHaveLength(2);
    for (const call of images.callsOfType('character_reference')) {
      expect(call.options.referenceImages?.map((r) => r.source)).toEqual([styleId]);
    }
    expect(result.styleReference.image.id).toBe(styleId);
    expect(result.styleReference.descriptor).toBe(project.styleDescriptor);
    expect(result.characters.map((c) => c.referenceImage?.id)).toEqual([
      `${FOX_AND_OWL_NAMESPACE}/images/character_01_fox.png`,
      `${FOX_AND_OWL_NAMESPACE}/images/character_02_owl.png`,
    ]);
    expect(store.has(styleId)).toBe(true);
  });

  it('gives every character its own reference even when names slug alike', async () => {
    let generated = 0;
    const images = new FakeImageService(() => ({ buffer: Buffer.from(`img-${++generated}`), mimeType: 'image/png' }));
    const store = new MemoryArtifactStore();
    const manager = new StyleLockManager(images, store, new ConcurrencyGate(1), LOCK_CONFIG);
    const cast = ['Лиса', 'Сова', 'Mr. Fox', 'Mr Fox'].map((name) => ({ name, visualTag: `${name} in a coat` }));
    const project = plannedFoxAndOwlProject({ characters: cast });

    const result = await manager.lock(project, project.characters);

    const ids = result.characters.map((c) => c.referenceImage?.id ?? '');
    expect(ids).toEqual([
      `${FOX_AND_OWL_NAMESPACE}/images/character_01_unnamed.png`,
      `${FOX_AND_OWL_NAMESPACE}/images/character_02_unnamed.png`,
      `${FOX_AND_OWL_NAMESPACE}/images/character_03_mr_fox.png`,
      `${FOX_AND_OWL_NAMESPACE}/images/character_04_mr_fox.png`,
    ]);
    const stored = await Promise.all(ids.map(async (id) => (await store.get(id)).toString()));
    expect(new Set(stored).size).toBe(4);
  });

  it('reuses existing locks without new requests', async () => {
    const images = new FakeImageService();
    const manager = new StyleLockManager(images, new MemoryArtifactStore(), new ConcurrencyGate(3), LOCK_CONFIG);
    const project = plannedFoxAndOwlProject();
    const first = await manager.lock(project, project.characters);
    const callsAfterFirst = images.calls.length;

    const second = await manager.lock({ ...project, styleReference: first.styleReference }, first.characters);

    expect(images.calls).toHaveLength(callsAfterFirst);
    expect(second).toEqual(first);
  });

  it('retries a failing character twice, then names it in CharacterLockFailure', async () => {
    const images = new FakeImageService((call) => {
      if (call.prompt.includes('character reference of Owl')) {
        throw new Error('provider unavailable');
      }
      return pngImage();
    });
    const manager = new StyleLockManager(images, new MemoryArtifactStore(), new ConcurrencyGate(3), LOCK_CONFIG);
    const project = plannedFoxAndOwlProject();

    const error = await manager.lock(project, project.characters).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CharacterLockFailure);
    expect(error).toMatchObject({
      characterName: 'Owl',
      retriesConsumed: 2,
      stage: 'styling',
      message: 'Reference generation for character "Owl" failed after 2 retries: provider unavailable',
    });
    expect(images.calls.filter((c) => c.prompt.includes('character reference of Owl'))).toHaveLength(3);
    expect(images.calls.filter((c) => c.prompt.includes('character reference of Fox'))).toHaveLength(1);
  });

  it('fails the lock without retrying when the style reference cannot be generated', async () => {
    const images = new FakeImageService((call) => {
      if (call.options.imageType === 'style_reference') {
        throw new Error('quota exceeded');
      }
      return pngImage();
    });
    const manager = new StyleLockManager(images, new MemoryArtifactStore(), new ConcurrencyGate(3), LOCK_CONFIG);
    const project = plannedFoxAndOwlProject();

    const error = await manager.lock(project, project.characters).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StyleLockFailure);
    expect(error).toMatchObject({ message: 'Style reference generation failed: quota exceeded', retriesConsumed: 0 });
    expect(images.calls).toHaveLength(1);
  });
});
