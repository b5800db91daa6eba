import { describe, it, expect, vi } from 'vitest';
import { limitBuy, limitSell, marketBuy, marketSell, type OrderPlacer } from '../src/exchange/namebase/orders.js';
import { NamebaseExchange } from '../src/exchange/namebase/rest.js';
import type { Transport, TransportRequest } from '../src/exchange/namebase/transport.js';
import type { OrderRequest } from '../src/types/index.js';
import { InvalidArgumentError } from '../src/errors.js';

const TS = 1555556529865;

const FILLED = {
  orderId: 174,
  createdAt: TS,
  price: '0.00000000',
  originalQuantity: '500.00000000',
  executedQuantity: '500.00000000',
  status: 'FILLED',
  type: 'MKT',
  side: 'SELL',
  fills: [
    {
      price: '0.00003000',
      quantity: '500.000000',
      quoteQuantity: '0.01500000',
      commission: '0.00000750',
      commissionAsset: 'BTC',
    },
  ],
};

function recordingExchange() {
  const calls: TransportRequest[] = [];
  const transport: Transport = {
    request: vi.fn(async (req: TransportRequest) => {
      calls.push(req);
      return { statusCode: 200, body: JSON.stringify(FILLED) };
    }),
  };
  const exchange = new NamebaseExchange({
    accessKey: 'test-key',
    secretKey: 'test-secret',
    apiRoot: 'https://www.namebase.io/api',
    apiVersion: '/v0',
    transport,
    now: () => TS,
  });
  return { exchange, transport, calls };
}

function mockPlacer() {
  const placeOrder = vi.fn(async (_order: OrderRequest) => FILLED);
  const placer: OrderPlacer = { placeOrder };
  return { placer, placeOrder };
}

describe('market orders', () => {
  it('marketSell builds the same request as placeOrder', async () => {
    const viaHelper = recordingExchange();
    const direct = recordingExchange();

    await marketSell(viaHelper.exchange, 'HNSBTC', 500);
    await direct.exchange.placeOrder({ symbol: 'HNSBTC', side: 'SELL', type: 'MKT', quantity: 500 });

    expect(viaHelper.calls).toHaveLength(1);
    expect(viaHelper.calls).toEqual(direct.calls);
  });

  it('marketSell posts a MKT SELL order', async () => {
    const { exchange, calls } = recordingExchange();
    const res = await marketSell(exchange, 'HNSBTC', 500);
    expect(res.status).toBe('FILLED');
    expect(calls[0]?.body).toBe('{"symbol":"HNSBTC","side":"SELL","type":"MKT","quantity":500,"timestamp":1555556529865}');
  });

  it('marketBuy sets side BUY and no price', async () => {
    const { placer, placeOrder } = mockPlacer();
    await marketBuy(placer, 'HNSBTC', 1000);
    expect(placeOrder).toHaveBeenCalledWith({
      symbol: 'HNSBTC',
      side: 'BUY',
      type: 'MKT',
      quantity: 1000,
      receiveWindow: undefined,
    });
  });

  it('forwards receiveWindow', async () => {
    const { placer, placeOrder } = mockPlacer();
    await marketSell(placer, 'HNSBTC', 10, { receiveWindow: 5000 });
    expect(placeOrder).toHaveBeenCalledWith({
      symbol: 'HNSBTC',
      side: 'SELL',
      type: 'MKT',
      quantity: 10,
      receiveWindow: 5000,
    });
  });

  it('rejects a non-positive quantity before the transport', async () => {
    const { exchange, transport } = recordingExchange();
    await expect(marketBuy(exchange, 'HNSBTC', 0)).rejects.toThrow(InvalidArgumentError);
    expect(transport.request).not.toHaveBeenCalled();
  });
});

describe('limit orders', () => {
  it('limitBuy sets LMT BUY with the price', async () => {
    const { placer, placeOrder } = mockPlacer();
    await limitBuy(placer, 'HNSBTC', 1000, 0.6);
    expect(placeOrder).toHaveBeenCalledWith({
      symbol: 'HNSBTC',
      side: 'BUY',
      type: 'LMT',
      quantity: 1000,
      price: 0.6,
      receiveWindow: undefined,
    });
  });

  it('limitSell sends price in the JSON body', async () => {
    const { exchange, calls } = recordingExchange();
    await limitSell(exchange, 'HNSBTC', 1000, 0.6);
    expect(calls[0]?.body).toBe(
      '{"symbol":"HNSBTC","side":"SELL","type":"LMT","quantity":1000,"price":0.6,"timestamp":1555556529865}',
    );
  });

  it('limitBuy without a price fails before the transport', async () => {
    const { exchange, transport } = recordingExchange();
    await expect(limitBuy(exchange, 'HNSBTC', 10, undefined)).rejects.toThrow(InvalidArgumentError);
    expect(transport.request).not.toHaveBeenCalled();
  });

  it.each([0, -0.1, Number.NaN])('limitSell rejects price %s', async (price) => {
    const { placer, placeOrder } = mockPlacer();
    await expect(limitSell(placer, 'HNSBTC', 10, price)).rejects.toThrow('limit orders need a positive price');
    expect(placeOrder).not.toHaveBeenCalled();
  });
});
