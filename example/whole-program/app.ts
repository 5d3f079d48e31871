/**
 * A small program traced without any calltrace calls in its code.
 *
 * Build first, then run the compiled file with the register entry:
 *
 *   npm run build
 *   CALLTRACE_DEBUG=1 node --import ./dist/src/register.js dist/example/whole-program/app.js
 *
 * Every top-level function and class method in this module (and in any
 * other project module it imports) is recorded into
 * calltrace_runs/run_<timestamp>.db.
 */

import { parseOrder, type Order } from './orders.js';

function subtotal(order: Order): number {
  return order.lines.reduce((sum, line) => sum + line.price * line.quantity, 0);
}

const withTax = (amount: number, rate = 0.2): number => Math.round(amount * (1 + rate) * 100) / 100;

class Checkout {
  constructor(private readonly currency: string) {}

  total(raw: string): string {
    const order = parseOrder(raw);
    return `${withTax(subtotal(order))} ${this.currency}`;
  }
}

const checkout = new Checkout('EUR');
console.log(checkout.total('pen:2:1.5,book:1:12'));
try {
  checkout.total('pen:two:1.5');
} catch (e) {
  console.log(`rejected: ${e instanceof Error ? e.message : String(e)}`);
}
