/**
 * Integration tests for the `start` and `stop` commands
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';

import { createCommand, startCommand, stopCommand } from '../../src/cli/commands/lifecycle.js';
import { DEV_LAB, createLabEnv, type LabEnv } from '../helpers/lab-env.js';

describe('start and stop commands', () => {
  let env: LabEnv;

  beforeEach(async () => {
    env = await createLabEnv();
    await env.writeConfig(DEV_LAB);
    await createCommand('dev', await env.context());
    env.takeStdout();
  });

  afterEach(async () => {
    await env.cleanup();
  });

  describe('stop', () => {
    it('should shut down every running guest', async () => {
      const code = await stopCommand('dev', await env.context());

      assert.strictEqual(code, 0);
      assert.deepStrictEqual(env.runner.callsOf('virsh', 'shutdown'), [
        ['virsh', 'shutdown', 'dev01'],
        ['virsh', 'shutdown', 'dev02'],
      ]);
      assert.deepStrictEqual(env.takeStdout().split('\n'), [
        'Stop guest: dev01',
        '  ✓ dev01 stop requested',
        'Stop guest: dev02',
        '  ✓ dev02 stop requested',
        '',
        'Lab dev: 2 stopped.',
        '',
      ]);
    });

    it('should record the lab as stopped and its guests as inactive', async () => {
      await stopCommand('dev', await env.context());

      assert.deepStrictEqual(await env.readJson('labs/dev.json'), {
        status: 'stopped',
        options: {},
        guests: ['dev01', 'dev02'],
      });
      assert.deepStrictEqual(await env.readJson('guests/dev02.json'), {
        lab: 'dev',
        mac: '52:54:00:00:00:02',
        status: 'inactive',
      });
      assert.deepStrictEqual(await env.readJson('labs.json'), { version: 1, active: ['dev'] });
    });

    it('should leave stopped guests alone', async () => {
      await stopCommand('dev', await env.context());
      env.takeStdout();

      const code = await stopCommand('dev', await env.context());

      assert.strictEqual(code, 0);
      assert.strictEqual(env.runner.callsOf('virsh', 'shutdown').length, 2);
      assert.deepStrictEqual(env.takeStdout().split('\n'), ['', 'Lab dev: 2 unchanged.', '']);
    });

    it('should report a guest whose domain cannot be queried', async () => {
      env.runner.failQuery.add('dev01');

      const code = await stopCommand('dev', await env.context());

      assert.strictEqual(code, 1);
      assert.deepStrictEqual(env.stderr.lines(), [
        '✗ Failed to query domain dev01: error: failed to connect to the hypervisor',
      ]);
      assert.deepStrictEqual(env.runner.callsOf('virsh', 'shutdown'), [['virsh', 'shutdown', 'dev02']]);
      assert.strictEqual(env.takeStdout().split('\n').at(-2), 'Lab dev: 1 stopped, 1 failed.');
    });
  });

  describe('start', () => {
    it('should start stopped guests', async () => {
      await stopCommand('dev', await env.context());
      env.takeStdout();

      const code = await startCommand('dev', await env.context());

      assert.strictEqual(code, 0);
      assert.deepStrictEqual(env.runner.callsOf('virsh', 'start'), [
        ['virsh', 'start', 'dev01'],
        ['virsh', 'start', 'dev02'],
      ]);
      assert.strictEqual(env.runner.domains.get('dev01')?.state, 'running');
      assert.strictEqual(env.takeStdout().split('\n').at(-2), 'Lab dev: 2 started.');
      assert.deepStrictEqual(await env.readJson('labs/dev.json'), {
        status: 'active',
        options: {},
        guests: ['dev01', 'dev02'],
      });
    });

    it('should leave running guests alone', async () => {
      const code = await startCommand('dev', await env.context());

      assert.strictEqual(code, 0);
      assert.deepStrictEqual(env.runner.callsOf('virsh', 'start'), []);
    });

    it('should start only the guests that are stopped', async () => {
      const dev02 = env.runner.domains.get('dev02');
      assert.ok(dev02);
      dev02.state = 'shut off';

      await startCommand('dev', await env.context());

      assert.deepStrictEqual(env.runner.callsOf('virsh', 'start'), [['virsh', 'start', 'dev02']]);
    });

    it('should not start a lab that is not configured', async () => {
      await env.writeConfig('[qa]\nguests = 1\n');

      const code = await startCommand('dev', await env.context());

      assert.strictEqual(code, 1);
      assert.strictEqual(env.stderr.lines()[0], "✗ Lab 'dev' is not defined");
    });
  });
});
