import { ReadableStream } from 'node:stream/web';
import type { Transport } from '../src/http-client';

export const encode = (text: string): Uint8Array => new TextEncoder().encode(text);

export const decode = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);

/**
 * A body that yields `chunks` one read at a time, then closes or errors with `failure`
 */
export function chunkedBody(chunks: string[], failure?: Error): ReadableStream<Uint8Array> {
  let index = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      if (index < chunks.length) {
        controller.enqueue(encode(chunks[index]));
        index += 1;
        return;
      }
      if (failure) {
        controller.error(failure);
      } else {
        controller.close();
      }
    },
  });
}

export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/**
 * In-process transport that records every request and answers with `respond`
 */
export function stubTransport(respond: (request: Request) => Response | Promise<Response>) {
  const requests: Request[] = [];
  const transport = jest.fn<Promise<Response>, [Request]>(async request => {
    requests.push(request);
    return respond(request);
  });
  const typed: Transport = transport;
  return { transport: typed, mock: transport, requests };
}

export async function rejection<E>(
  promise: Promise<unknown>,
  type: new (...args: never[]) => E
): Promise<E> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected promise to reject with ${type.name}`);
}

export function thrown<E>(fn: () => unknown, type: new (...args: never[]) => E): E {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected function to throw ${type.name}`);
}
