export interface OrderLine {
  item: string;
  quantity: number;
  price: number;
}

export interface Order {
  lines: OrderLine[];
}

function parseLine(text: string): OrderLine {
  const [item, quantity, price] = text.split(':');
  const line = { item, quantity: Number(quantity), price: Number(price) };
  if (!item || !Number.isInteger(line.quantity) || Number.isNaN(line.price)) {
    throw new SyntaxError(`Bad order line '${text}'`);
  }
  return line;
}

export function parseOrder(raw: string): Order {
  return { lines: raw.split(',').map(parseLine) };
}
