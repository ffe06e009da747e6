/**
 * In-process stand-in for virsh and kvm-install-vm.
 *
 * Keeps a table of domains; `create` adds one, `remove` deletes it,
 * `start`/`shutdown` flip its state. Every call is recorded.
 */

import type { CommandRunner, RunOptions } from '../../src/virt/executor.js';
import type { CommandResult, DomainState } from '../../src/virt/types.js';

export interface FakeDomain {
  name: string;
  state: DomainState;
  mac: string;
}

export interface ShellCall {
  script: string;
  options: RunOptions;
}

const ok = (stdout = ''): CommandResult => ({ exitCode: 0, stdout, stderr: '' });
const fail = (stderr: string, exitCode = 1): CommandResult => ({ exitCode, stdout: '', stderr });

export class FakeRunner implements CommandRunner {
  readonly domains = new Map<string, FakeDomain>();
  readonly calls: string[][] = [];
  readonly shellCalls: ShellCall[] = [];
  /** Guest names whose create fails */
  readonly failCreate = new Set<string>();
  /** Domain names whose dominfo fails with a non-missing error */
  readonly failQuery = new Set<string>();
  /** Exit code returned for hook snippets */
  hookExitCode = 0;
  private macCounter = 0;

  addDomain(name: string, state: DomainState = 'running', mac?: string): FakeDomain {
    const domain = { name, state, mac: mac ?? this.nextMac() };
    this.domains.set(name, domain);
    return domain;
  }

  /** Calls whose first two words match, e.g. ('kvm-install-vm', 'create') */
  callsOf(tool: string, sub: string): string[][] {
    return this.calls.filter((argv) => argv[0] === tool && argv[1] === sub);
  }

  async run(argv: readonly string[], _options?: RunOptions): Promise<CommandResult> {
    this.calls.push([...argv]);
    const [tool, sub] = argv;
    const name = argv[argv.length - 1] ?? '';

    if (tool === 'virsh') {
      return this.virsh(sub ?? '', name);
    }
    if (tool === 'kvm-install-vm') {
      return this.installer(sub ?? '', name);
    }
    return fail(`${tool ?? ''}: command not found`, 127);
  }

  async runShell(script: string, options: RunOptions = {}): Promise<CommandResult> {
    this.shellCalls.push({ script, options });
    return this.hookExitCode === 0 ? ok() : fail('hook failed', this.hookExitCode);
  }

  private virsh(sub: string, name: string): CommandResult {
    if (this.failQuery.has(name)) {
      return fail('error: failed to connect to the hypervisor');
    }
    const domain = this.domains.get(name);
    if (!domain) {
      return fail(`error: failed to get domain '${name}'`);
    }

    switch (sub) {
      case 'dominfo':
        return ok(
          [
            'Id:             1',
            `Name:           ${domain.name}`,
            'UUID:           00000000-0000-0000-0000-000000000001',
            `State:          ${domain.state}`,
            'CPU(s):         1',
            'Max memory:     1048576 KiB',
            'Autostart:      disable',
            '',
          ].join('\n')
        );
      case 'dumpxml':
        return ok(
          `<domain type='kvm'>\n  <name>${domain.name}</name>\n  <devices>\n    <interface type='bridge'>\n      <mac address='${domain.mac}'/>\n    </interface>\n  </devices>\n</domain>\n`
        );
      case 'start':
        if (domain.state === 'running') {
          return fail('error: Domain is already active');
        }
        domain.state = 'running';
        return ok(`Domain '${name}' started\n`);
      case 'shutdown':
        domain.state = 'shut off';
        return ok(`Domain '${name}' is being shutdown\n`);
      default:
        return fail(`error: unknown command: '${sub}'`);
    }
  }

  private installer(sub: string, name: string): CommandResult {
    switch (sub) {
      case 'create':
        if (this.failCreate.has(name)) {
          return fail('ERR: Could not download cloud image');
        }
        this.addDomain(name);
        return ok();
      case 'remove':
        this.domains.delete(name);
        return ok();
      default:
        return fail(`unknown subcommand ${sub}`);
    }
  }

  private nextMac(): string {
    this.macCounter++;
    return `52:54:00:00:00:${this.macCounter.toString(16).padStart(2, '0')}`;
  }
}
