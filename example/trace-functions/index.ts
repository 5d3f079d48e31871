/**
 * Standalone example of explicit tracing with trace() and traceClass().
 *
 * Nothing is instrumented at load time; only the wrapped functions are
 * recorded. Run with:
 *
 *   npx tsx example/trace-functions/index.ts
 */

import { startTracing, trace, traceClass, withTrace } from '../../src/index.js';

// =============================================================================
// Example 1: Nested function calls
// =============================================================================

const multiply = trace(function multiply(x: number, y = 2): number {
  return x * y;
});

const add = trace(function add(a: number, b: number): number {
  return multiply(a) + multiply(b);
});

// =============================================================================
// Example 2: Async function tracing
// =============================================================================

const fetchSimulated = trace(async function fetchSimulated(
  url: string,
  delay: number = 50
): Promise<{ url: string; status: number }> {
  await new Promise((resolve) => setTimeout(resolve, delay));
  return { url, status: 200 };
});

// =============================================================================
// Example 3: Hiding sensitive arguments
// =============================================================================

const authenticate = withTrace({ captureArgs: false })(function authenticate(
  username: string,
  password: string
): boolean {
  return username === 'admin' && password === 'test-secret';
});

// =============================================================================
// Example 4: Class methods
// =============================================================================

class Inventory {
  private stock = new Map<string, number>();

  restock(item: string, count: number): number {
    const total = (this.stock.get(item) ?? 0) + count;
    this.stock.set(item, total);
    return total;
  }

  static seeded(): Inventory {
    const inventory = new Inventory();
    inventory.restock('apple', 3);
    return inventory;
  }
}
traceClass(Inventory);

// =============================================================================
// Example 5: Error handling
// =============================================================================

const divide = trace(function divide(a: number, b: number): number {
  if (b === 0) throw new RangeError('Division by zero');
  return a / b;
});

// =============================================================================
// Main
// =============================================================================

async function main(): Promise<void> {
  const session = startTracing({ instrument: false, dbDirectory: 'calltrace_runs' });

  try {
    console.log(`add(3, 4) = ${add(3, 4)}`);
    console.log(`fetchSimulated() = ${JSON.stringify(await fetchSimulated('https://example.com/data'))}`);
    console.log(`authenticate() = ${authenticate('admin', 'test-secret')}`);
    console.log(`restock() = ${Inventory.seeded().restock('apple', 2)}`);
    try {
      divide(1, 0);
    } catch {
      console.log('divide(1, 0) threw (the error is in the trace)');
    }

    console.log('\n' + session.render());

    const result = await session.flush();
    console.log(`\nTrace written to: ${result.destination}`);
  } finally {
    session.close();
  }
}

main().catch((e) => {
  console.error('Error:', e);
  process.exitCode = 1;
});
