import path from 'path';

export type PathOptions = {
  homeDir: string;
  xdgDataHome?: string;
  zinitHome?: string;
  ezpodmanBin?: string;
};

export type ResolvedPaths = {
  homeDir: string;
  /** Always `~/dotfiles`; not configurable. */
  dotfilesDir: string;
  zinitHome: string;
  nvimConfigDir: string;
  ezpodmanBin: string;
  etcShells: string;
};

export function resolvePaths(opts: PathOptions): ResolvedPaths {
  const homeDir = opts.homeDir;
  const dataHome = opts.xdgDataHome || path.join(homeDir, '.local', 'share');
  return {
    homeDir,
    dotfilesDir: path.join(homeDir, 'dotfiles'),
    zinitHome: opts.zinitHome || path.join(dataHome, 'zinit', 'zinit.git'),
    nvimConfigDir: path.join(homeDir, '.config', 'nvim'),
    ezpodmanBin: opts.ezpodmanBin || path.join(homeDir, '.local', 'bin', 'ezpodman'),
    etcShells: '/etc/shells',
  };
}
