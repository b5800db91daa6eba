import { InvalidArgumentError } from '../../errors.js';
import type { OrderRequest, TradingSymbol } from '../../types/index.js';
import type { NamebaseExchange, ReceiveWindowOptions } from './rest.js';
import type { OrderAck } from './schemas.js';

/** placeOrder만 있으면 되므로 테스트에서 대역을 넣을 수 있다 */
export type OrderPlacer = Pick<NamebaseExchange, 'placeOrder'>;

function requirePrice(price: number | undefined): number {
  if (price === undefined || !Number.isFinite(price) || price <= 0) {
    throw new InvalidArgumentError('Invalid price: limit orders need a positive price');
  }
  return price;
}

/** 시장가 매수 (quantity = HNS 수량) */
export async function marketBuy(
  client: OrderPlacer,
  symbol: TradingSymbol,
  quantity: number,
  options: ReceiveWindowOptions = {},
): Promise<OrderAck> {
  const order: OrderRequest = { symbol, side: 'BUY', type: 'MKT', quantity, receiveWindow: options.receiveWindow };
  return client.placeOrder(order);
}

/** 시장가 매도 */
export async function marketSell(
  client: OrderPlacer,
  symbol: TradingSymbol,
  quantity: number,
  options: ReceiveWindowOptions = {},
): Promise<OrderAck> {
  const order: OrderRequest = { symbol, side: 'SELL', type: 'MKT', quantity, receiveWindow: options.receiveWindow };
  return client.placeOrder(order);
}

/** 지정가 매수 (price = HNS 1개당 BTC) */
export async function limitBuy(
  client: OrderPlacer,
  symbol: TradingSymbol,
  quantity: number,
  price: number | undefined,
  options: ReceiveWindowOptions = {},
): Promise<OrderAck> {
  const order: OrderRequest = {
    symbol,
    side: 'BUY',
    type: 'LMT',
    quantity,
    price: requirePrice(price),
    receiveWindow: options.receiveWindow,
  };
  return client.placeOrder(order);
}

/** 지정가 매도 */
export async function limitSell(
  client: OrderPlacer,
  symbol: TradingSymbol,
  quantity: number,
  price: number | undefined,
  options: ReceiveWindowOptions = {},
): Promise<OrderAck> {
  const order: OrderRequest = {
    symbol,
    side: 'SELL',
    type: 'LMT',
    quantity,
    price: requirePrice(price),
    receiveWindow: options.receiveWindow,
  };
  return client.placeOrder(order);
}
