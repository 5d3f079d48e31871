import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { initialize, instrumentLoaded, type HookData } from '../src/instrument/hooks.js';
import { InstrumentationError } from '../src/errors.js';
import { logger } from '../src/logger.js';

const RUNTIME_URL = 'file:///opt/calltrace/runtime.js';

describe('loader hooks', () => {
  let root: string;

  function projectFile(relative: string, source: string): string {
    const file = path.join(root, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, source);
    return pathToFileURL(file).href;
  }

  async function setup(overrides: Partial<HookData> = {}): Promise<void> {
    await initialize({
      projectRoot: root,
      fallback: false,
      runtimeUrl: RUNTIME_URL,
      runtimePrefix: path.join(root, '.no-runtime'),
      ...overrides,
    });
  }

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'calltrace-hooks-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should instrument project ES modules', async () => {
    await setup();
    const source = 'export function ping() { return 1; }\n';
    const url = projectFile('src/ping.js', source);

    const result = instrumentLoaded(url, { format: 'module', source });

    expect(result.format).toBe('module');
    expect(typeof result.source).toBe('string');
    const code = typeof result.source === 'string' ? result.source : '';
    expect(code.startsWith(`import * as __calltrace from "${RUNTIME_URL}"; ping = __calltrace.wrap(ping, `)).toBe(true);
    expect(code.endsWith(source)).toBe(true);
  });

  it('should decode binary sources', async () => {
    await setup();
    const source = 'export const pong = () => 2;\n';
    const url = projectFile('src/pong.js', source);

    const result = instrumentLoaded(url, { format: 'module', source: new TextEncoder().encode(source) });

    const code = typeof result.source === 'string' ? result.source : '';
    expect(code).toContain('export const pong = __calltrace.wrap(() => 2, ');
  });

  it('should pass third-party modules through', async () => {
    await setup();
    const source = 'export function helper() {}\n';
    const url = projectFile('node_modules/lib/index.js', source);
    const loaded = { format: 'module' as const, source };

    expect(instrumentLoaded(url, loaded)).toBe(loaded);
  });

  it('should pass CommonJS modules through', async () => {
    await setup();
    const source = 'function helper() {}\nmodule.exports = helper;\n';
    const url = projectFile('src/helper.cjs', source);
    const loaded = { format: 'commonjs' as const, source };

    expect(instrumentLoaded(url, loaded)).toBe(loaded);
  });

  it('should pass non-file modules through', async () => {
    await setup();
    const loaded = { format: 'builtin' as const };

    expect(instrumentLoaded('node:fs', loaded)).toBe(loaded);
  });

  it('should reject project modules that do not parse', async () => {
    await setup();
    const source = 'export function broken( {\n';
    const url = projectFile('src/broken.js', source);

    expect(() => instrumentLoaded(url, { format: 'module', source })).toThrow(InstrumentationError);
  });

  it('should load unparseable modules untraced under fallback', async () => {
    await setup({ fallback: true });
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const source = 'export function broken( {\n';
    const url = projectFile('src/broken.js', source);
    const loaded = { format: 'module' as const, source };

    expect(instrumentLoaded(url, loaded)).toBe(loaded);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^Cannot instrument .*broken\.js: .*; loading it untraced$/s);
  });
});
