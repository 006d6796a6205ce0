import fs from 'node:fs';
import path from 'node:path';
import { ConfigError } from '../errors.js';

export type HookResult = { name: string; path: string; status: 'installed' | 'replaced' | 'skipped' };

export const HOOKS: Record<string, string[]> = {
  'commit-msg': [
    '#!/usr/bin/env sh',
    'set -eu',
    'exec npx --no-install pushlint --msg-file "$1"',
  ],
  'pre-push': [
    '#!/usr/bin/env sh',
    'set -eu',
    'exec npx --no-install pushlint',
  ],
};

function installHook(hookDir: string, name: string, lines: string[], force: boolean): HookResult {
  const p = path.join(hookDir, name);
  const exists = fs.existsSync(p);
  if (exists && !force) return { name, path: p, status: 'skipped' };
  fs.writeFileSync(p, lines.join('\n') + '\n', { mode: 0o755 });
  // writeFileSync keeps the old mode of an existing file
  fs.chmodSync(p, 0o755);
  return { name, path: p, status: exists ? 'replaced' : 'installed' };
}

export function installHooks(hookDir: string, opts: { force?: boolean } = {}): HookResult[] {
  if (!fs.existsSync(hookDir)) {
    throw new ConfigError(`No hooks directory at ${hookDir}. Is this a git repo?`);
  }
  return Object.entries(HOOKS).map(([name, lines]) => installHook(hookDir, name, lines, !!opts.force));
}
