/**
 * Unit tests for the action planner
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { planGuestAction } from '../../../src/core/planner.js';
import type { GuestDecision, GuestObservation, Skip } from '../../../src/core/types.js';
import type { CreateGuestParams } from '../../../src/virt/types.js';

function observe(overrides: Partial<GuestObservation> = {}): GuestObservation {
  return {
    guestNumber: 1,
    guestName: 'dev01',
    exists: true,
    running: true,
    owner: 'dev',
    ...overrides,
  };
}

function expectSkip(decision: GuestDecision): Skip {
  assert.strictEqual(decision.kind, 'skip');
  if (decision.kind !== 'skip') {
    throw new Error('unreachable');
  }
  return decision.skip;
}

const params: CreateGuestParams = {
  name: 'dev01',
  autostart: false,
  bridge: 'virbr0',
  cpus: 2,
  disksize: 20,
  domain: 'lab.test',
  feature: 'host',
  graphics: 'spice',
  image: '',
  key: '',
  imagedir: '',
  vmdir: '',
  memory: 2048,
  mac: '',
  port: '',
  scriptname: '',
  distro: 'centos8',
  timezone: 'US/Eastern',
  user: 'tester',
};

describe('planGuestAction', () => {
  describe('create', () => {
    it('should create a guest whose domain does not exist', () => {
      const decision = planGuestAction('create', observe({ exists: false, running: false, owner: '' }), 'dev', params);

      assert.deepStrictEqual(decision, {
        kind: 'action',
        action: { type: 'create', guestNumber: 1, guestName: 'dev01', params },
      });
    });

    it('should skip an existing domain with a warning', () => {
      const skip = expectSkip(planGuestAction('create', observe(), 'dev', params));

      assert.strictEqual(skip.reason, 'exists');
      assert.strictEqual(skip.warn, true);
      assert.strictEqual(skip.message, 'Domain dev01 already exists');
    });

    it('should name the other lab that owns an existing domain', () => {
      const skip = expectSkip(planGuestAction('create', observe({ owner: 'qa' }), 'dev', params));

      assert.strictEqual(skip.message, 'Domain dev01 already exists (owned by lab qa)');
    });
  });

  describe('ownership', () => {
    for (const command of ['destroy', 'start', 'stop'] as const) {
      it(`should leave a missing domain alone on ${command}`, () => {
        const skip = expectSkip(planGuestAction(command, observe({ exists: false, running: false }), 'dev'));

        assert.strictEqual(skip.reason, 'absent');
        assert.strictEqual(skip.warn, false);
        assert.strictEqual(skip.message, 'Domain dev01 does not exist');
      });

      it(`should refuse a domain of another lab on ${command}`, () => {
        const skip = expectSkip(planGuestAction(command, observe({ owner: 'qa' }), 'dev'));

        assert.strictEqual(skip.reason, 'owned-by-other');
        assert.strictEqual(skip.warn, true);
        assert.strictEqual(skip.message, 'Domain dev01 belongs to lab qa, not dev');
      });
    }

    it('should refuse a domain no lab owns', () => {
      const skip = expectSkip(planGuestAction('destroy', observe({ owner: '' }), 'dev'));

      assert.strictEqual(skip.message, 'Domain dev01 belongs to no lab, not dev');
    });
  });

  describe('destroy', () => {
    it('should destroy an owned domain whether or not it runs', () => {
      for (const running of [true, false]) {
        assert.deepStrictEqual(planGuestAction('destroy', observe({ running }), 'dev'), {
          kind: 'action',
          action: { type: 'destroy', guestNumber: 1, guestName: 'dev01' },
        });
      }
    });
  });

  describe('start', () => {
    it('should start a stopped domain', () => {
      assert.deepStrictEqual(planGuestAction('start', observe({ running: false }), 'dev'), {
        kind: 'action',
        action: { type: 'start', guestNumber: 1, guestName: 'dev01' },
      });
    });

    it('should skip a running domain quietly', () => {
      const skip = expectSkip(planGuestAction('start', observe(), 'dev'));

      assert.strictEqual(skip.reason, 'already-running');
      assert.strictEqual(skip.warn, false);
    });
  });

  describe('stop', () => {
    it('should stop a running domain', () => {
      assert.deepStrictEqual(planGuestAction('stop', observe(), 'dev'), {
        kind: 'action',
        action: { type: 'stop', guestNumber: 1, guestName: 'dev01' },
      });
    });

    it('should skip a stopped domain quietly', () => {
      const skip = expectSkip(planGuestAction('stop', observe({ running: false }), 'dev'));

      assert.strictEqual(skip.reason, 'already-stopped');
      assert.strictEqual(skip.message, 'Domain dev01 is not running');
    });
  });
});
