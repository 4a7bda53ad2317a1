import { describe, it, expect, vi } from 'vitest';
import { fromArray, ref } from '../testing/in-memory-object-store';
import { ObjectRef } from '../types/migration.interface';
import { logger } from '../utils/logger';
import { Filter } from './filter.stage';

vi.mock('../utils/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

async function names(items: AsyncIterable<ObjectRef>): Promise<string[]> {
  const result: string[] = [];
  for await (const item of items) {
    result.push(item.name);
  }
  return result;
}

describe('Filter', () => {
  it('should drop matching items and pass the rest unchanged', async () => {
    const filter = new Filter("exclude keys containing 'default'", (item) => item.name.includes('default'));
    const kept = ref('photos/cat.jpg');

    const output: ObjectRef[] = [];
    for await (const item of filter.apply(fromArray([ref('default/avatar.png'), kept]))) {
      output.push(item);
    }

    expect(output).toEqual([kept]);
    expect(output[0]).toBe(kept);
    expect(filter.getStats()).toEqual({ processed: 1, skipped: 1, failed: 0 });
    expect(logger.info).toHaveBeenCalledWith("SKIPPED: by exclude keys containing 'default' filter.", {
      key: 'default/avatar.png',
      stage: "exclude keys containing 'default'",
    });
  });

  it('should compose with other filters in any order', async () => {
    const items = [ref('a/'), ref('a/default.txt'), ref('a/b.txt')];
    const noDefault = () => new Filter('default', (item) => item.name.includes('default'));
    const noFolders = () => new Filter('folders', (item) => item.name.endsWith('/'));

    const forward = await names(noFolders().apply(noDefault().apply(fromArray(items))));
    const reverse = await names(noDefault().apply(noFolders().apply(fromArray(items))));

    expect(forward).toEqual(['a/b.txt']);
    expect(reverse).toEqual(['a/b.txt']);
  });
});
