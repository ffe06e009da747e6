/**
 * Unit tests for naming utilities
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  assertValidLabName,
  buildHostname,
  deriveGuestName,
  toEnvName,
} from '../../../src/core/naming.js';
import { ConfigError, TemplateError } from '../../../src/core/errors.js';

describe('assertValidLabName', () => {
  it('should accept letters, digits and underscores', () => {
    for (const name of ['dev', 'Lab_2', '42']) {
      assert.doesNotThrow(() => assertValidLabName(name), name);
    }
  });

  it('should reject other characters', () => {
    for (const name of ['dev-lab', 'dev.1', '.global', '', 'dev lab', 'dév']) {
      assert.throws(
        () => assertValidLabName(name),
        (error: unknown) => error instanceof ConfigError && error.code === 'INVALID_LAB_NAME',
        name
      );
    }
  });

  it('should quote the name in the message', () => {
    assert.throws(() => assertValidLabName('my-lab'), { message: "Invalid lab name 'my-lab'" });
  });
});

describe('deriveGuestName', () => {
  const lookup = (values: Record<string, string | number>) => (key: string) => values[key];

  it('should expand the default template', () => {
    assert.strictEqual(deriveGuestName('{lab}{guest:02d}', lookup({ lab: 'dev', guest: 3 })), 'dev03');
  });

  it('should accept other option values', () => {
    assert.strictEqual(
      deriveGuestName('{distro}-{lab}-{guest}', lookup({ distro: 'centos8', lab: 'qa', guest: 1 })),
      'centos8-qa-1'
    );
  });

  it('should trim surrounding whitespace', () => {
    assert.strictEqual(deriveGuestName(' {lab}{guest} ', lookup({ lab: 'dev', guest: 1 })), 'dev1');
  });

  it('should report unknown placeholders', () => {
    assert.throws(() => deriveGuestName('{lab}{nothing}', lookup({ lab: 'dev' })), TemplateError);
  });
});

describe('buildHostname', () => {
  it('should append the domain', () => {
    assert.strictEqual(buildHostname('dev01', 'lab.test'), 'dev01.lab.test');
  });

  it('should return the bare name without a domain', () => {
    assert.strictEqual(buildHostname('dev01', ''), 'dev01');
  });
});

describe('toEnvName', () => {
  it('should upper-case and prefix the option name', () => {
    assert.strictEqual(toEnvName('bridge'), 'KVMLAB_BRIDGE');
  });

  it('should replace non-alphanumerics with underscores', () => {
    assert.strictEqual(toEnvName('group.web'), 'KVMLAB_GROUP_WEB');
    assert.strictEqual(toEnvName('var.ansible-user'), 'KVMLAB_VAR_ANSIBLE_USER');
  });

  it('should take another prefix', () => {
    assert.strictEqual(toEnvName('gateway', 'VIRTLAB_'), 'VIRTLAB_GATEWAY');
  });
});
