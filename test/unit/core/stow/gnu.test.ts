import { describe, expect, it } from 'vitest';
import { GnuStowBackend, parseStowConflicts } from '../../../../src/core/stow/gnu.js';
import type { StowPackage } from '../../../../src/core/types.js';
import { SetupErrorCode } from '../../../../src/utils/errors.js';
import { FakeProbe, RecordingSystem } from '../../../helpers.js';

const STDERR = [
  'WARNING! stowing zsh would cause conflicts:',
  '  * existing target is neither a link nor a directory: .zshrc',
  '  * existing target is not owned by stow: .config/zsh',
  'All operations aborted.',
].join('\n');

const zsh: StowPackage = {
  name: 'zsh',
  detect: null,
  sourceDir: '/home/u/dotfiles/zsh',
  targetDir: '/home/u',
  extraLinks: [],
};

function setup() {
  const probe = new FakeProbe();
  const system = new RecordingSystem();
  return { probe, system, backend: new GnuStowBackend({ probe, system }) };
}

describe('parseStowConflicts', () => {
  it('collects the bulleted lines', () => {
    expect(parseStowConflicts(STDERR)).toEqual([
      'existing target is neither a link nor a directory: .zshrc',
      'existing target is not owned by stow: .config/zsh',
    ]);
  });

  it('finds nothing in a clean run', () => {
    expect(parseStowConflicts('LINK: .zshrc => dotfiles/zsh/.zshrc\n')).toEqual([]);
  });
});

describe('GnuStowBackend', () => {
  it('requires stow on PATH', async () => {
    const { probe, backend } = setup();
    await expect(backend.preflight()).rejects.toMatchObject({ code: SetupErrorCode.MISSING_PRECONDITION });
    probe.commands.add('stow');
    await expect(backend.preflight()).resolves.toBeUndefined();
  });

  it('simulates before linking', async () => {
    const { probe, backend } = setup();
    probe.succeed('stow -d /home/u/dotfiles -t /home/u -n --restow zsh');
    expect(await backend.trial(zsh, { restow: true })).toEqual({ conflicts: [] });
    expect(probe.queries).toEqual(['stow -d /home/u/dotfiles -t /home/u -n --restow zsh']);
  });

  it('reports conflicts from the simulation', async () => {
    const { probe, backend } = setup();
    probe.respond('stow -d /home/u/dotfiles -t /home/u -n zsh', { stdout: '', stderr: STDERR, exitCode: 1 });
    const { conflicts } = await backend.trial(zsh, { restow: false });
    expect(conflicts).toHaveLength(2);
  });

  it('treats any other simulation failure as a conflict', async () => {
    const { probe, backend } = setup();
    probe.respond('stow -d /home/u/dotfiles -t /home/u -n zsh', {
      stdout: '',
      stderr: '\nstow: ERROR: The stow directory dotfiles does not contain package zsh\n',
      exitCode: 2,
    });
    expect(await backend.trial(zsh, { restow: false })).toEqual({
      conflicts: ['stow: ERROR: The stow directory dotfiles does not contain package zsh'],
    });
  });

  it('links with restow and adopt flags', async () => {
    const { system, backend } = setup();
    await backend.link(zsh, { restow: true, adopt: true });
    expect(system.commands).toEqual(['stow -d /home/u/dotfiles -t /home/u --restow --adopt zsh']);
  });

  it('throws when stow fails', async () => {
    const { system, backend } = setup();
    system.fail('stow -d /home/u/dotfiles -t /home/u zsh');
    await expect(backend.link(zsh, { restow: false, adopt: false })).rejects.toThrow("stow failed for 'zsh'");
  });
});
