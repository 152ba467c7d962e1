import { describe, expect, it } from 'vitest';
import { runSetup } from '../../../src/commands/setup.js';
import { loadCatalog } from '../../../src/core/catalog.js';
import { loadConfig } from '../../../src/core/config.js';
import { createContext } from '../../../src/core/context.js';
import { SetupErrorCode } from '../../../src/utils/errors.js';
import { FakeProbe, RecordingSystem, createMemoryLogger } from '../../helpers.js';

const CONFLICT_STDERR = [
  'WARNING! stowing mystery would cause conflicts:',
  '  * existing target is neither a link nor a directory: .mysteryrc',
  'All operations aborted.',
].join('\n');

function context(env: NodeJS.ProcessEnv = {}) {
  const config = loadConfig({ HOME: '/home/u', ...env }, {}, 'linux');
  const probe = new FakeProbe();
  probe.commands.add('git').add('stow').add('zsh');
  probe.dirs.add('/home/u/dotfiles').add('/home/u/dotfiles/.git');
  const system = new RecordingSystem();
  const logger = createMemoryLogger();
  return { ctx: createContext(config, { logger, uid: 1000, probe, system }), probe, system, logger };
}

describe('runSetup', () => {
  it('pulls the dotfiles and stows each app', async () => {
    const { ctx, probe, system } = context();
    probe.dirs.add('/home/u/dotfiles/zsh').add('/home/u/dotfiles/mystery');
    probe.succeed('stow -d /home/u/dotfiles -t /home/u -n --restow zsh');
    probe.respond('stow -d /home/u/dotfiles -t /home/u -n --restow mystery', {
      stdout: '',
      stderr: CONFLICT_STDERR,
      exitCode: 1,
    });

    const result = await runSetup(ctx, { apps: ['zsh', 'mystery'], bootstrap: false, stow: true });

    expect(result.exitCode).toBe(1);
    expect(result.provision).toBeNull();
    expect(result.stow?.outcomes.map((o) => o.outcome)).toEqual(['linked', 'conflict-refused']);
    expect(system.commands).toEqual([
      'git -C /home/u/dotfiles pull --ff-only',
      'stow -d /home/u/dotfiles -t /home/u --restow zsh',
    ]);
  });

  it('exits cleanly when every package links', async () => {
    const { ctx, probe } = context();
    probe.dirs.add('/home/u/dotfiles/zsh');
    probe.succeed('stow -d /home/u/dotfiles -t /home/u -n --restow zsh');

    const result = await runSetup(ctx, { apps: ['zsh'], bootstrap: false, stow: true });

    expect(result.exitCode).toBe(0);
  });

  it('can skip stowing', async () => {
    const { ctx, logger } = context();
    const result = await runSetup(ctx, { apps: ['zsh'], bootstrap: false, stow: false });
    expect(result).toEqual({ provision: null, stow: null, exitCode: 0 });
    expect(logger.messages('info')).toContain('Skipping stow (--skip-stow)');
  });

  it('needs stow before linking', async () => {
    const { ctx, probe } = context();
    probe.commands.delete('stow');
    await expect(runSetup(ctx, { apps: ['zsh'], bootstrap: false, stow: true }))
      .rejects.toMatchObject({ code: SetupErrorCode.MISSING_PRECONDITION });
  });

  it('does not link dotfiles after a failed provisioning run', async () => {
    const { ctx, system } = context();
    system.fail('sudo dnf install -y zsh');
    const catalog = await loadCatalog();

    await expect(runSetup(ctx, { apps: ['zsh'], bootstrap: true, stow: true }, { osRelease: 'ID=fedora\n', catalog }))
      .rejects.toMatchObject({ code: SetupErrorCode.INSTALL_FAILED });
    expect(system.commands.some((c) => c.startsWith('stow'))).toBe(false);
  });
});
