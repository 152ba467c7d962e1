import { describe, expect, it } from 'vitest';
import { syncDotfiles } from '../../../src/core/dotfiles.js';
import { SetupErrorCode } from '../../../src/utils/errors.js';
import { FakeProbe, RecordingSystem, createMemoryLogger } from '../../helpers.js';

const DIR = '/home/u/dotfiles';
const REPO_URL = 'git@example.com:me/dotfiles.git';

function setup(repoUrl: string | null = REPO_URL) {
  const probe = new FakeProbe();
  probe.commands.add('git');
  const system = new RecordingSystem();
  const opts = { dir: DIR, repoUrl, probe, system, logger: createMemoryLogger() };
  return { probe, system, opts };
}

describe('syncDotfiles', () => {
  it('requires git', async () => {
    const { probe, opts } = setup();
    probe.commands.delete('git');
    await expect(syncDotfiles(opts)).rejects.toMatchObject({
      code: SetupErrorCode.MISSING_PRECONDITION,
      message: 'git not found. Install git, then re-run.',
    });
  });

  it('pulls an existing checkout', async () => {
    const { probe, system, opts } = setup();
    probe.dirs.add(DIR).add(`${DIR}/.git`);
    expect(await syncDotfiles(opts)).toBe('updated');
    expect(system.commands).toEqual([`git -C ${DIR} pull --ff-only`]);
  });

  it('fails when the pull fails', async () => {
    const { probe, system, opts } = setup();
    probe.dirs.add(DIR).add(`${DIR}/.git`);
    system.fail(`git -C ${DIR} pull --ff-only`);
    await expect(syncDotfiles(opts)).rejects.toMatchObject({ code: SetupErrorCode.VCS_FAILED });
  });

  it('refuses a directory that is not a checkout', async () => {
    const { probe, system, opts } = setup();
    probe.dirs.add(DIR);
    await expect(syncDotfiles(opts)).rejects.toMatchObject({
      code: SetupErrorCode.MISSING_PRECONDITION,
      message: `${DIR} exists but is not a git repo.`,
      hints: ['Move it aside (or delete it) then re-run.'],
    });
    expect(system.commands).toEqual([]);
  });

  it('clones into a fresh home', async () => {
    const { system, opts } = setup();
    expect(await syncDotfiles(opts)).toBe('cloned');
    expect(system.commands).toEqual([`git clone ${REPO_URL} ${DIR}`]);
  });

  it('needs a repository REPO_URL to clone', async () => {
    const { system, opts } = setup(null);
    await expect(syncDotfiles(opts)).rejects.toMatchObject({ code: SetupErrorCode.INVALID_CONFIG });
    expect(system.commands).toEqual([]);
  });

  it('explains a failed clone', async () => {
    const { system, opts } = setup();
    system.fail(`git clone ${REPO_URL} ${DIR}`);
    await expect(syncDotfiles(opts)).rejects.toMatchObject({
      code: SetupErrorCode.VCS_FAILED,
      message: 'Failed to clone dotfiles repo.',
    });
  });
});
