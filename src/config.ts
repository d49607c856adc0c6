import process from 'node:process';
import { DEFAULT_BROWSER_CHANNEL, DEFAULT_REQUEST_TIMEOUT_MS } from './constants.js';

export interface BrowserLaunchSettings {
  headless: boolean;
  channel?: string;
  executablePath?: string;
  timeoutMs: number;
}

export function getRequestTimeoutMs(env: NodeJS.ProcessEnv = process.env): number {
  const rawTimeout = env.RICEXPRO_TIMEOUT_MS;
  if (!rawTimeout) {
    return DEFAULT_REQUEST_TIMEOUT_MS;
  }

  const parsedTimeout = Number.parseInt(rawTimeout, 10);
  if (!Number.isFinite(parsedTimeout) || parsedTimeout <= 0) {
    // Note: Silently use default timeout. Invalid configuration is a developer
    // error and logging would leak implementation details in stdio mode.
    return DEFAULT_REQUEST_TIMEOUT_MS;
  }

  return parsedTimeout;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      return undefined;
  }
}

/**
 * Resolves how the browser is launched. An explicit executable path wins
 * over the channel; `headless` falls back to `defaultHeadless` when the
 * environment does not say.
 */
export function getBrowserLaunchSettings(
  defaultHeadless: boolean,
  env: NodeJS.ProcessEnv = process.env,
): BrowserLaunchSettings {
  const headless = parseBoolean(env.RICEXPRO_HEADLESS) ?? defaultHeadless;
  const executablePath = env.RICEXPRO_BROWSER_PATH?.trim();
  const timeoutMs = getRequestTimeoutMs(env);

  if (executablePath) {
    return { headless, executablePath, timeoutMs };
  }

  const channel = env.RICEXPRO_BROWSER_CHANNEL?.trim() || DEFAULT_BROWSER_CHANNEL;
  return { headless, channel, timeoutMs };
}

export function getOutputDir(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env.RICEXPRO_OUTPUT_DIR?.trim() || undefined;
}

export function getViewerApp(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env.RICEXPRO_VIEWER?.trim() || undefined;
}
