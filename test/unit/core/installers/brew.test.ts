import { describe, expect, it } from 'vitest';
import { BrewInstaller } from '../../../../src/core/installers/brew.js';
import type { PackageSpec } from '../../../../src/core/types.js';
import { SetupErrorCode } from '../../../../src/utils/errors.js';
import { FakeProbe, RecordingSystem, createMemoryLogger } from '../../../helpers.js';

function setup() {
  const probe = new FakeProbe();
  probe.commands.add('brew');
  const system = new RecordingSystem([]);
  const logger = createMemoryLogger();
  const installer = new BrewInstaller({ probe, system, logger });
  return { probe, system, logger, installer };
}

const cask = (name: string): PackageSpec => ({ name, source: { kind: 'cask' }, applicability: () => true });

describe('BrewInstaller', () => {
  it('requires Homebrew on PATH', async () => {
    const { probe, installer } = setup();
    await expect(installer.preflight()).resolves.toBeUndefined();
    probe.commands.delete('brew');
    await expect(installer.preflight()).rejects.toMatchObject({
      code: SetupErrorCode.MISSING_PRECONDITION,
      message: 'Homebrew not found. Install it first, then re-run.',
    });
  });

  it('leaves an installed formula alone and asks only once', async () => {
    const { probe, system, logger, installer } = setup();
    probe.succeed('brew list --formula fzf');
    expect(await installer.ensure('fzf')).toEqual({ package: 'fzf', outcome: 'already-present' });
    expect(await installer.ensure('fzf')).toEqual({ package: 'fzf', outcome: 'already-present' });
    expect(probe.queries).toEqual(['brew list --formula fzf']);
    expect(system.commands).toEqual([]);
    expect(logger.messages('info')).toEqual(['brew: fzf already installed']);
  });

  it('installs a missing formula without sudo', async () => {
    const { system, installer } = setup();
    expect(await installer.ensure('fzf')).toEqual({ package: 'fzf', outcome: 'installed' });
    expect(await installer.ensure('fzf')).toEqual({ package: 'fzf', outcome: 'already-present' });
    expect(system.commands).toEqual(['brew install fzf']);
  });

  it('installs casks with --cask', async () => {
    const { probe, system, installer } = setup();
    expect(await installer.ensure(cask('ghostty'))).toEqual({ package: 'ghostty', outcome: 'installed' });
    expect(probe.queries).toEqual(['brew list --cask ghostty']);
    expect(system.commands).toEqual(['brew install --cask ghostty']);
  });

  it('retries a failed install on the next call', async () => {
    const { system, installer } = setup();
    system.fail('brew install nope', 1);
    expect(await installer.ensure('nope')).toEqual({
      package: 'nope',
      outcome: 'failed',
      detail: 'brew could not install nope',
    });
    expect(await installer.ensure('nope')).toEqual({ package: 'nope', outcome: 'installed' });
    expect(system.commands).toEqual(['brew install nope', 'brew install nope']);
  });

  it('taps before installing from a tap', async () => {
    const { system, installer } = setup();
    const spec: PackageSpec = {
      name: 'mactop',
      source: { kind: 'repository-plugin', channel: { type: 'tap', name: 'context-labs/mactop' } },
      applicability: () => true,
    };
    expect((await installer.ensure(spec)).outcome).toBe('installed');
    expect(system.commands).toEqual(['brew tap context-labs/mactop', 'brew install mactop']);
  });

  it('cannot enable a COPR', async () => {
    const { system, installer } = setup();
    const spec: PackageSpec = {
      name: 'yazi',
      source: { kind: 'repository-plugin', channel: { type: 'copr', name: 'lihaohong/yazi' } },
      applicability: () => true,
    };
    expect(await installer.ensure(spec)).toEqual({
      package: 'yazi',
      outcome: 'failed',
      detail: 'could not enable COPR lihaohong/yazi',
    });
    expect(system.commands).toEqual([]);
  });

  it('has no index to refresh', async () => {
    const { installer } = setup();
    expect(await installer.refreshIndex()).toBeNull();
  });
});
