import process from 'node:process';
import type { Command } from 'commander';
import { loadConfig } from '../config/config.js';
import { createLogger } from '../logger.js';
import { StoredCredentialProvider } from '../services/credentials.js';
import { GitRepository } from '../services/local-repo.js';
import { ActionOrchestrator, type ActionResult } from '../services/orchestrator.js';

const logger = createLogger();

/** Value of the global `--token` option, if set anywhere on the command chain. */
export function tokenOverride(command: Command): string | undefined {
  const token: unknown = command.optsWithGlobals().token;
  return typeof token === 'string' && token.trim() !== '' ? token : undefined;
}

export function createOrchestrator(command: Command): ActionOrchestrator {
  return new ActionOrchestrator({
    repository: new GitRepository(process.cwd()),
    credentials: new StoredCredentialProvider({ tokenOverride: tokenOverride(command) }),
    config: loadConfig(),
  });
}

/** Prints the action's warnings and returns its value, or throws its error. */
export function unwrap<T>(result: ActionResult<T>): T {
  if (!result.ok) {
    logger.debug(`action failed in state ${result.state}; remote call issued: ${result.remoteCallIssued}`);
    throw result.error;
  }
  for (const warning of result.warnings) {
    logger.warn(warning);
  }
  return result.value;
}

export function collectValues(value: string, previous: string[]): string[] {
  const parts = value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
  return [...previous, ...parts];
}
