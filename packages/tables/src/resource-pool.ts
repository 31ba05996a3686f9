import { getLogger } from '@burnish/logger';

import { getErrorMessage } from './errors.js';

const logger = getLogger('resource-pool');

export interface PooledResource {
  readonly label: string;
  release(): void;
}

/**
 * Tracks open file handles held by record sources so they can be freed in
 * bulk once a batch of work is finished.
 */
export class ResourcePool {
  private readonly resources = new Set<PooledResource>();

  get size(): number {
    return this.resources.size;
  }

  acquire<T extends PooledResource>(resource: T): T {
    this.resources.add(resource);
    return resource;
  }

  free(resource: PooledResource): void {
    if (!this.resources.delete(resource)) return;
    this.releaseOne(resource);
  }

  /**
   * Release everything still held. Returns the number of resources freed.
   */
  releaseAll(): number {
    const pending = [...this.resources];
    this.resources.clear();
    for (const resource of pending) {
      this.releaseOne(resource);
    }
    if (pending.length > 0) {
      logger.debug({ count: pending.length }, 'Released pooled resources');
    }
    return pending.length;
  }

  private releaseOne(resource: PooledResource): void {
    try {
      resource.release();
    } catch (error) {
      logger.warn({ error: getErrorMessage(error), resource: resource.label }, 'Failed to release resource');
    }
  }
}

export const sharedResourcePool = new ResourcePool();

/**
 * Free every handle opened through the shared pool.
 */
export function releaseResources(): number {
  return sharedResourcePool.releaseAll();
}
