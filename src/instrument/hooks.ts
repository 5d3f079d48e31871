/**
 * Module customization hooks that instrument project ES modules as they
 * load. Registered through `module.register()` by `installHooks`; they run
 * on Node's loader thread.
 */

import type { InitializeHook, LoadFnOutput, LoadHook } from 'module';
import { fileURLToPath } from 'url';
import { TextDecoder } from 'util';
import { shouldInstrument } from './selector.js';
import { instrumentSource } from './transform.js';
import { InstrumentationError, toError } from '../errors.js';
import { logger } from '../logger.js';

export interface HookData {
  projectRoot: string;
  /** Load modules unmodified when instrumenting them fails */
  fallback: boolean;
  /** URL of the runtime module imported by instrumented code */
  runtimeUrl: string;
  runtimePrefix?: string;
}

let settings: HookData | null = null;

// Compiled calltrace sources; the runtime must never trace itself
const OWN_ROOT = new URL('../', import.meta.url).href;

export const initialize: InitializeHook<HookData> = (data) => {
  settings = data;
};

/**
 * Instrument the output of the default loader for `url` when it is a
 * project ES module; anything else is returned unchanged.
 */
export function instrumentLoaded(url: string, result: LoadFnOutput): LoadFnOutput {
  if (!settings || result.format !== 'module' || !url.startsWith('file:') || url.startsWith(OWN_ROOT)) {
    return result;
  }

  const filename = fileURLToPath(url);
  const decision = shouldInstrument(settings.projectRoot, filename, {
    runtimePrefix: settings.runtimePrefix,
  });
  if (!decision.include) {
    logger.debug(`Skipping ${filename} (${decision.reason})`);
    return result;
  }

  try {
    if (result.source === undefined) {
      throw new InstrumentationError(`No source available for ${filename}`, filename);
    }
    const source =
      typeof result.source === 'string' ? result.source : new TextDecoder().decode(result.source);
    const { code, wrapped } = instrumentSource(source, {
      filename,
      projectRoot: settings.projectRoot,
      runtimeSpecifier: settings.runtimeUrl,
    });
    logger.debug(`Instrumented ${filename}: ${wrapped.join(', ') || '(nothing to wrap)'}`);
    return { ...result, source: code };
  } catch (e) {
    const error =
      e instanceof InstrumentationError
        ? e
        : new InstrumentationError(`Cannot instrument ${filename}: ${toError(e).message}`, filename, toError(e));
    if (settings.fallback) {
      logger.warn(`${error.message}; loading it untraced`);
      return result;
    }
    throw error;
  }
}

export const load: LoadHook = async (url, context, nextLoad) => {
  return instrumentLoaded(url, await nextLoad(url, context));
};
