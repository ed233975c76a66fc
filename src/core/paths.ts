import path from 'path';
import type { Environment } from './types.js';

export type DotfileSources = {
  gitconfig: string;
  vscodeSettings: string;
  vscodeKeybindings: string;
  vscodeSnippets: string;
  vscodeExtensions: string;
  zshrc: string;
  pythonRequirements: string;
  pythonVenv: string;
  itermDir: string;
  itermPlist: string;
};

export type ResolvedTargets = {
  gitconfig: string;
  vscodeUserDir: string;
  zshrc: string;
  ohMyZshDir: string;
  itermPlist: string;
};

export const ITERM_DOMAIN = 'com.googlecode.iterm2';

export function resolveSources(dotfilesDir: string): DotfileSources {
  const itermDir = path.join(dotfilesDir, 'iterm2');
  return {
    gitconfig: path.join(dotfilesDir, 'git', '.gitconfig'),
    vscodeSettings: path.join(dotfilesDir, 'vscode', 'settings.json'),
    vscodeKeybindings: path.join(dotfilesDir, 'vscode', 'keybindings.json'),
    vscodeSnippets: path.join(dotfilesDir, 'vscode', 'snippets'),
    vscodeExtensions: path.join(dotfilesDir, 'vscode', 'extensions.txt'),
    zshrc: path.join(dotfilesDir, 'zsh', '.zshrc'),
    pythonRequirements: path.join(dotfilesDir, 'python', 'requirements.txt'),
    pythonVenv: path.join(dotfilesDir, 'python', 'venv'),
    itermDir,
    itermPlist: path.join(itermDir, `${ITERM_DOMAIN}.plist`),
  };
}

function vscodeUserDir(env: Environment): string {
  switch (env.osKind) {
    case 'windows':
      return path.join(env.homeDir, 'AppData', 'Roaming', 'Code', 'User');
    case 'macos':
      return path.join(env.homeDir, 'Library', 'Application Support', 'Code', 'User');
    case 'linux':
      return path.join(env.homeDir, '.config', 'Code', 'User');
  }
}

export function resolveTargets(env: Environment): ResolvedTargets {
  return {
    gitconfig: path.join(env.homeDir, '.gitconfig'),
    vscodeUserDir: vscodeUserDir(env),
    zshrc: path.join(env.homeDir, '.zshrc'),
    ohMyZshDir: path.join(env.homeDir, '.oh-my-zsh'),
    itermPlist: path.join(env.homeDir, 'Library', 'Preferences', `${ITERM_DOMAIN}.plist`),
  };
}
