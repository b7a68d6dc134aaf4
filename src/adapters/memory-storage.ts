/**
 * In-memory storage adapter for testing and simple use cases
 */

import type { StorageAdapter } from '../interfaces';

type StoredValue = string | boolean;

/**
 * Simple in-memory implementation of StorageAdapter.
 * `setAvailable(false)` makes every call throw, to exercise persistence failures.
 */
export class MemoryStorageAdapter implements StorageAdapter {
  private values = new Map<string, StoredValue>();
  private available = true;
  private failWrites = 0;

  async getString(key: string): Promise<string | null> {
    this.assertAvailable();
    const value = this.values.get(key);
    return typeof value === 'string' ? value : null;
  }

  async setString(key: string, value: string): Promise<void> {
    this.assertWritable();
    this.values.set(key, value);
  }

  async getBoolean(key: string): Promise<boolean | null> {
    this.assertAvailable();
    const value = this.values.get(key);
    return typeof value === 'boolean' ? value : null;
  }

  async setBoolean(key: string, value: boolean): Promise<void> {
    this.assertWritable();
    this.values.set(key, value);
  }

  async remove(key: string): Promise<void> {
    this.assertWritable();
    this.values.delete(key);
  }

  async keys(): Promise<string[]> {
    this.assertAvailable();
    return Array.from(this.values.keys());
  }

  // Utility methods for testing and debugging
  setAvailable(available: boolean): void {
    this.available = available;
  }

  /** The next `count` writes throw; reads keep working */
  failNextWrites(count = 1): void {
    this.failWrites = count;
  }

  size(): number {
    return this.values.size;
  }

  clear(): void {
    this.values.clear();
  }

  // Export/import for persistence in other storage systems
  exportData(): Record<string, StoredValue> {
    return Object.fromEntries(this.values);
  }

  importData(data: Record<string, StoredValue>): void {
    this.values = new Map(Object.entries(data));
  }

  private assertAvailable(): void {
    if (!this.available) throw new Error('Storage unavailable');
  }

  private assertWritable(): void {
    this.assertAvailable();
    if (this.failWrites > 0) {
      this.failWrites--;
      throw new Error('Storage write failed');
    }
  }
}
