/**
 * Pantry Store
 *
 * Persistence collaborator owned by the inventory agent. The default store is
 * a JSON document `{ "available": [{ "name", "quantity", "unit" }] }`; a
 * missing file reads as an empty pantry.
 */
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import type { PantryItem } from '../agents/types.js';

export interface PantryStore {
  list(): Promise<PantryItem[]>;
}

const PantryItemSchema = z.object({
  name: z.string().min(1),
  quantity: z.number().nonnegative().default(1),
  unit: z.string().default('unit'),
});

export const PantryFileSchema = z.object({
  available: z.array(PantryItemSchema).default([]),
});

export class JsonFilePantryStore implements PantryStore {
  readonly path: string;

  constructor(path: string) {
    this.path = resolve(path);
  }

  async list(): Promise<PantryItem[]> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const result = PantryFileSchema.safeParse(JSON.parse(content));
    if (!result.success) {
      throw new Error(`Pantry file ${this.path} is malformed: ${result.error.message}`);
    }
    return result.data.available;
  }
}

/** Fixed pantry contents, for tests and demos. */
export class InMemoryPantryStore implements PantryStore {
  private readonly items: PantryItem[];

  constructor(items: PantryItem[] = []) {
    this.items = items.map((item) => ({ ...item }));
  }

  async list(): Promise<PantryItem[]> {
    return this.items.map((item) => ({ ...item }));
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
  );
}
