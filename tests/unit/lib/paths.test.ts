/**
 * Unit tests for Path Utilities
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { homedir } from 'node:os';
import { join } from 'node:path';
import {
  LEASE_DIR,
  expandHome,
  getConfigDir,
  getGuestStatePath,
  getLabStatePath,
  getLeaseFilePath,
  getRegistryPath,
} from '../../../src/lib/paths.js';

describe('expandHome', () => {
  it('should expand ~ to home directory', () => {
    assert.strictEqual(expandHome('~'), homedir());
  });

  it('should expand ~/path to home directory path', () => {
    assert.strictEqual(expandHome('~/virt/images'), join(homedir(), 'virt/images'));
  });

  it('should leave ~user forms untouched', () => {
    assert.strictEqual(expandHome('~alice/keys'), '~alice/keys');
  });

  it('should preserve absolute and relative paths', () => {
    assert.strictEqual(expandHome('/var/lib/kvmlab'), '/var/lib/kvmlab');
    assert.strictEqual(expandHome('scripts/setup.sh'), 'scripts/setup.sh');
  });

  it('should only expand a leading tilde', () => {
    assert.strictEqual(expandHome('/data/~/x'), '/data/~/x');
  });
});

describe('getConfigDir', () => {
  let saved: string | undefined;

  beforeEach(() => {
    saved = process.env['KVMLAB_CONFIG_DIR'];
    delete process.env['KVMLAB_CONFIG_DIR'];
  });

  afterEach(() => {
    if (saved === undefined) {
      delete process.env['KVMLAB_CONFIG_DIR'];
    } else {
      process.env['KVMLAB_CONFIG_DIR'] = saved;
    }
  });

  it('should prefer an explicit directory', () => {
    process.env['KVMLAB_CONFIG_DIR'] = '/from/env';
    assert.strictEqual(getConfigDir('/explicit'), '/explicit');
  });

  it('should fall back to $KVMLAB_CONFIG_DIR', () => {
    process.env['KVMLAB_CONFIG_DIR'] = '/from/env';
    assert.strictEqual(getConfigDir(), '/from/env');
  });

  it('should default to ~/.config/kvmlab', () => {
    assert.strictEqual(getConfigDir(), join(homedir(), '.config', 'kvmlab'));
  });

  it('should expand ~ in the explicit directory', () => {
    assert.strictEqual(getConfigDir('~/labs'), join(homedir(), 'labs'));
  });
});

describe('state paths', () => {
  it('should place lab variables under labs/', () => {
    assert.strictEqual(getLabStatePath('/data', 'dev'), join('/data', 'labs', 'dev.json'));
  });

  it('should place guest variables under guests/', () => {
    assert.strictEqual(getGuestStatePath('/data', 'dev01'), join('/data', 'guests', 'dev01.json'));
  });

  it('should keep the registry at the top of the data directory', () => {
    assert.strictEqual(getRegistryPath('/data'), join('/data', 'labs.json'));
  });
});

describe('getLeaseFilePath', () => {
  it('should use the libvirt dnsmasq directory by default', () => {
    assert.strictEqual(getLeaseFilePath('virbr0'), join(LEASE_DIR, 'virbr0.status'));
  });

  it('should accept another lease directory', () => {
    assert.strictEqual(getLeaseFilePath('br1', '/tmp/leases'), join('/tmp/leases', 'br1.status'));
  });
});
