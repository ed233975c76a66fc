import path from 'path';
import type { Mapping } from './types.js';
import type { DotfileSources, ResolvedTargets } from './paths.js';

export function gitMappings(sources: DotfileSources, targets: ResolvedTargets): Mapping[] {
  return [{ name: 'gitconfig', source: sources.gitconfig, target: targets.gitconfig }];
}

export function vscodeMappings(sources: DotfileSources, targets: ResolvedTargets): Mapping[] {
  return [
    {
      name: 'vscode-settings',
      source: sources.vscodeSettings,
      target: path.join(targets.vscodeUserDir, 'settings.json'),
    },
    {
      name: 'vscode-keybindings',
      source: sources.vscodeKeybindings,
      target: path.join(targets.vscodeUserDir, 'keybindings.json'),
    },
    {
      name: 'vscode-snippets',
      source: sources.vscodeSnippets,
      target: path.join(targets.vscodeUserDir, 'snippets'),
    },
  ];
}

export function zshMappings(sources: DotfileSources, targets: ResolvedTargets): Mapping[] {
  return [{ name: 'zshrc', source: sources.zshrc, target: targets.zshrc }];
}

export function itermMappings(sources: DotfileSources, targets: ResolvedTargets): Mapping[] {
  return [{ name: 'iterm-plist', source: sources.itermPlist, target: targets.itermPlist }];
}
