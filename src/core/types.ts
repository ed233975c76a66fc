export type OsKind = 'macos' | 'windows' | 'linux';
export type SourceKind = 'file' | 'dir';
export type StepName = 'packages' | 'git' | 'vscode' | 'python' | 'zsh' | 'iterm';

export const STEP_NAMES: readonly StepName[] = ['packages', 'git', 'vscode', 'python', 'zsh', 'iterm'];

export type Environment = Readonly<{
  homeDir: string;
  dotfilesDir: string;
  osKind: OsKind;
}>;

export type Mapping = {
  name: string;
  source: string;
  target: string;
};

export type LinkStrategyName = 'symlink' | 'fallback';

export type LinkOutcome = {
  status: 'linked' | 'failed';
  backedUp: boolean;
  strategy: LinkStrategyName;
};

export type RunSummary = {
  completed: StepName[];
  skipped: StepName[];
  failed: StepName[];
};
