/**
 * Lazy singleton for the configured artifact store
 */
import { storageConfig } from '@/config/environment.js';
import { GcsArtifactStore, LocalArtifactStore, MemoryArtifactStore, type IArtifactStore } from '@/services/storage.js';

let _storageSingleton: IArtifactStore | null = null;

function createArtifactStore(): IArtifactStore {
  const config = storageConfig.get();
  switch (config.kind) {
    case 'gcs':
      if (!config.bucketName) {
        throw new Error('STORAGE_BUCKET_NAME is required when ARTIFACT_STORE=gcs');
      }
      return new GcsArtifactStore({ bucketName: config.bucketName, projectId: config.projectId });
    case 'memory':
      return new MemoryArtifactStore();
    case 'local':
      return new LocalArtifactStore(config.storiesDir);
  }
}

export function getArtifactStore(): IArtifactStore {
  if (!_storageSingleton) {
    _storageSingleton = createArtifactStore();
  }
  return _storageSingleton;
}

// Test-only helper to reset the singleton between tests
export function resetStorageForTests(): void {
  _storageSingleton = null;
}
