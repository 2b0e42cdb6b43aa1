/**
 * Unit tests for the filesystem project source
 */

import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { createFsProjectSource } from '@/modules/projects/index.js';

describe('createFsProjectSource', () => {
  it('reports a missing file as not found', async () => {
    const filePath = path.join(os.tmpdir(), 'flood-reports-missing', 'projects.csv');
    const source = createFsProjectSource({ filePath });

    const result = await source.readText();

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({
        type: 'FileNotFoundError',
        message: `Dataset file not found at ${filePath}`,
        path: filePath,
      });
    }
    expect(source.location).toBe(filePath);
  });
});
