import { register } from 'module';
import type { HookData } from './hooks.js';

export interface InstallHooksOptions {
  projectRoot: string;
  fallback?: boolean;
  runtimePrefix?: string;
}

/**
 * Register the loader hooks for this process. Only modules imported after
 * this call are instrumented.
 */
export function installHooks(options: InstallHooksOptions): void {
  const data: HookData = {
    projectRoot: options.projectRoot,
    fallback: options.fallback ?? false,
    runtimeUrl: new URL('../runtime.js', import.meta.url).href,
    runtimePrefix: options.runtimePrefix,
  };
  register(new URL('./hooks.js', import.meta.url), { data });
}
