/**
 * Unit tests for the variable store
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { VariableStore, isVariableMap } from '../../../src/state/store.js';
import { StateError } from '../../../src/core/errors.js';

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

describe('VariableStore', () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(async () => {
    tempDir = join(tmpdir(), `kvmlab-test-${randomUUID()}`);
    await mkdir(tempDir, { recursive: true });
    filePath = join(tempDir, 'guests', 'dev01.json');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('open', () => {
    it('should start empty when the file does not exist', async () => {
      const store = await VariableStore.open(filePath);

      assert.deepStrictEqual(store.entries(), {});
      assert.strictEqual(await exists(filePath), false);
    });

    it('should load an existing document', async () => {
      await mkdir(join(tempDir, 'guests'));
      await writeFile(filePath, JSON.stringify({ lab: 'dev', mac: '52:54:00:00:00:01' }));

      const store = await VariableStore.open(filePath);

      assert.strictEqual(store.getString('lab'), 'dev');
      assert.strictEqual(store.getString('mac'), '52:54:00:00:00:01');
    });

    it('should reject a document that is not JSON', async () => {
      await mkdir(join(tempDir, 'guests'));
      await writeFile(filePath, '{ not json');

      await assert.rejects(VariableStore.open(filePath), (error: unknown) => {
        assert.ok(error instanceof StateError);
        assert.strictEqual(error.code, 'STATE_CORRUPTED');
        assert.strictEqual(error.statePath, filePath);
        return true;
      });
    });

    it('should reject a document that is not an object', async () => {
      await mkdir(join(tempDir, 'guests'));
      await writeFile(filePath, '["dev"]');

      await assert.rejects(VariableStore.open(filePath), StateError);
    });

    it('should reject a known variable of the wrong type', async () => {
      await mkdir(join(tempDir, 'guests'));
      await writeFile(filePath, JSON.stringify({ lab: 'dev', mac: 52 }));

      await assert.rejects(VariableStore.open(filePath), (error: unknown) => {
        assert.ok(error instanceof StateError);
        assert.strictEqual(error.code, 'STATE_CORRUPTED');
        assert.strictEqual(
          error.message,
          `State file is malformed: ${filePath} (document/mac must be string)`
        );
        return true;
      });
    });

    it('should reject an unknown status', async () => {
      await mkdir(join(tempDir, 'guests'));
      await writeFile(filePath, JSON.stringify({ status: 'paused' }));

      await assert.rejects(VariableStore.open(filePath), StateError);
    });

    it('should reject recorded guest names that are not strings', async () => {
      await mkdir(join(tempDir, 'guests'));
      await writeFile(filePath, JSON.stringify({ status: 'active', guests: ['dev01', 2] }));

      await assert.rejects(VariableStore.open(filePath), StateError);
    });

    it('should keep variables it does not know', async () => {
      await mkdir(join(tempDir, 'guests'));
      await writeFile(filePath, JSON.stringify({ lab: 'dev', note: { seen: [1, true] } }));

      const store = await VariableStore.open(filePath);

      assert.deepStrictEqual(store.get('note'), { seen: [1, true] });
    });
  });

  describe('set', () => {
    it('should write the document on every change', async () => {
      const store = await VariableStore.open(filePath);
      await store.set('lab', 'dev');
      await store.set('status', 'active');

      const content = JSON.parse(await readFile(filePath, 'utf-8'));
      assert.deepStrictEqual(content, { lab: 'dev', status: 'active' });
    });

    it('should not leave a temp file behind', async () => {
      const store = await VariableStore.open(filePath);
      await store.set('lab', 'dev');

      assert.strictEqual(await exists(`${filePath}.tmp`), false);
    });

    it('should be read back by a new store', async () => {
      const first = await VariableStore.open(filePath);
      await first.set('options', { cpus: '4' });

      const second = await VariableStore.open(filePath);
      assert.deepStrictEqual(second.getStringRecord('options'), { cpus: '4' });
    });

    it('should keep changes in memory when read-only', async () => {
      const store = await VariableStore.open(filePath, { readOnly: true });
      await store.set('lab', 'dev');

      assert.strictEqual(store.getString('lab'), 'dev');
      assert.strictEqual(await exists(filePath), false);
    });
  });

  describe('typed getters', () => {
    it('should return undefined for a value of another type', async () => {
      const store = await VariableStore.open(filePath, { readOnly: true });
      await store.set('count', 3);
      await store.set('name', 'dev');

      assert.strictEqual(store.getString('count'), undefined);
      assert.strictEqual(store.getStringRecord('name'), undefined);
      assert.strictEqual(store.get('count'), 3);
    });

    it('should drop non-string members of a record', async () => {
      const store = await VariableStore.open(filePath, { readOnly: true });
      await store.set('options', { cpus: '2', extra: 5 });

      assert.deepStrictEqual(store.getStringRecord('options'), { cpus: '2' });
    });
  });

  describe('delete and purge', () => {
    it('should remove a single variable', async () => {
      const store = await VariableStore.open(filePath);
      await store.set('lab', 'dev');
      await store.set('ip', '192.168.122.10');
      await store.delete('ip');

      assert.strictEqual(store.has('ip'), false);
      const content = JSON.parse(await readFile(filePath, 'utf-8'));
      assert.deepStrictEqual(content, { lab: 'dev' });
    });

    it('should delete the document on purge', async () => {
      const store = await VariableStore.open(filePath);
      await store.set('lab', 'dev');
      await store.purge();

      assert.deepStrictEqual(store.entries(), {});
      assert.strictEqual(await exists(filePath), false);
    });

    it('should purge a store that was never written', async () => {
      const store = await VariableStore.open(filePath);
      await store.purge();

      assert.strictEqual(await exists(filePath), false);
    });

    it('should keep the file when purging read-only', async () => {
      const writer = await VariableStore.open(filePath);
      await writer.set('lab', 'dev');

      const store = await VariableStore.open(filePath, { readOnly: true });
      await store.purge();

      assert.strictEqual(await exists(filePath), true);
    });
  });

  it('should report its path', async () => {
    const store = await VariableStore.open(filePath);
    assert.strictEqual(store.getPath(), filePath);
  });
});

describe('isVariableMap', () => {
  it('should accept plain objects only', () => {
    assert.strictEqual(isVariableMap({ a: 1 }), true);
    assert.strictEqual(isVariableMap([]), false);
    assert.strictEqual(isVariableMap(null), false);
    assert.strictEqual(isVariableMap('x'), false);
  });
});
