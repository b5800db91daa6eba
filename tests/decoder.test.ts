import { describe, it, expect } from 'vitest';
import { decodeResponse } from '../src/exchange/namebase/decoder.js';
import { DecodeError, ExchangeError } from '../src/errors.js';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected decodeResponse to throw');
}

describe('decodeResponse', () => {
  it('returns the parsed payload unchanged on 200', () => {
    expect(decodeResponse(200, '{"bids":[],"asks":[]}')).toEqual({ bids: [], asks: [] });
  });

  it('returns arrays as-is', () => {
    expect(decodeResponse(200, '[{"tradeId":1}]')).toEqual([{ tradeId: 1 }]);
  });

  it('treats an empty 2xx body as an empty object', () => {
    expect(decodeResponse(204, '')).toEqual({});
  });

  it('does not treat success:false as an error', () => {
    expect(decodeResponse(200, '{"success":false,"message":"pending"}')).toEqual({
      success: false,
      message: 'pending',
    });
  });

  it('throws DecodeError on malformed JSON', () => {
    const err = catchError(() => decodeResponse(200, '{"bids": ['));
    expect(err).toBeInstanceOf(DecodeError);
    expect(err instanceof DecodeError && err.rawBody).toBe('{"bids": [');
  });

  it('maps a 400 with a string error field to ExchangeError', () => {
    const err = catchError(() => decodeResponse(400, '{"error":"insufficient funds"}'));
    expect(err).toBeInstanceOf(ExchangeError);
    if (!(err instanceof ExchangeError)) return;
    expect(err.message).toBe('insufficient funds');
    expect(err.status).toBe(400);
    expect(err.code).toBeUndefined();
    expect(err.payload).toEqual({ error: 'insufficient funds' });
  });

  it('reads code and message from an error object', () => {
    const err = catchError(() =>
      decodeResponse(401, '{"error":{"name":"BAD_AUTH","message":"invalid credentials"}}'),
    );
    expect(err).toBeInstanceOf(ExchangeError);
    if (!(err instanceof ExchangeError)) return;
    expect(err.code).toBe('BAD_AUTH');
    expect(err.message).toBe('invalid credentials');
  });

  it('falls back to top-level code/message on non-2xx', () => {
    const err = catchError(() => decodeResponse(422, '{"code":"INVALID_QUANTITY","message":"quantity too small"}'));
    expect(err).toBeInstanceOf(ExchangeError);
    if (!(err instanceof ExchangeError)) return;
    expect(err.code).toBe('INVALID_QUANTITY');
    expect(err.message).toBe('quantity too small');
  });

  it('uses the HTTP status when the error body is not JSON', () => {
    const err = catchError(() => decodeResponse(502, '<html>Bad Gateway</html>'));
    expect(err).toBeInstanceOf(ExchangeError);
    if (!(err instanceof ExchangeError)) return;
    expect(err.message).toBe('HTTP 502');
    expect(err.payload).toBe('<html>Bad Gateway</html>');
  });

  it('uses the HTTP status when the error body is empty', () => {
    const err = catchError(() => decodeResponse(500, ''));
    expect(err).toBeInstanceOf(ExchangeError);
    expect(err instanceof ExchangeError && err.message).toBe('HTTP 500');
  });

  it('raises ExchangeError for an error field on a 200', () => {
    const err = catchError(() => decodeResponse(200, '{"error":"order not found"}'));
    expect(err).toBeInstanceOf(ExchangeError);
    if (!(err instanceof ExchangeError)) return;
    expect(err.status).toBe(200);
    expect(err.message).toBe('order not found');
  });

  it('ignores a null error field on a 200', () => {
    expect(decodeResponse(200, '{"error":null,"price":"0.00002300"}')).toEqual({
      error: null,
      price: '0.00002300',
    });
  });

  it.each(['false', '""', '0'])('does not treat error: %s on a 200 as a failure', (value) => {
    expect(decodeResponse(200, `{"error":${value},"price":"0.00002300"}`)).toEqual({
      error: JSON.parse(value),
      price: '0.00002300',
    });
  });

  it('uses the status text when a non-2xx body has error: false', () => {
    const err = catchError(() => decodeResponse(500, '{"error":false}'));
    expect(err).toBeInstanceOf(ExchangeError);
    expect(err instanceof ExchangeError && err.message).toBe('HTTP 500');
  });
});
