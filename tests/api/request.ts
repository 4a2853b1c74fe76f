import express from 'express';

export interface ApiResponse {
  status: number;
  body: unknown;
}

export interface RequestOptions {
  /** Sent as JSON. */
  body?: unknown;
  /** Sent as-is, for signature checks over exact bytes. */
  raw?: string;
  headers?: Record<string, string>;
}

/** Serve `app` on an ephemeral port for one request. */
export async function request(
  app: express.Application,
  method: string,
  path: string,
  options: RequestOptions = {},
): Promise<ApiResponse> {
  return new Promise<ApiResponse>((resolve, reject) => {
    const server = app.listen(0, () => {
      const address = server.address();
      const port = address !== null && typeof address === 'object' ? address.port : 0;
      const init: RequestInit = {
        method,
        headers: { 'Content-Type': 'application/json', ...options.headers },
      };
      if (options.raw !== undefined) init.body = options.raw;
      else if (options.body !== undefined) init.body = JSON.stringify(options.body);

      fetch(`http://127.0.0.1:${port}${path}`, init)
        .then(async (res) => {
          const body: unknown = await res.json();
          server.close();
          resolve({ status: res.status, body });
        })
        .catch((err: unknown) => {
          server.close();
          reject(err);
        });
    });
  });
}

/** Read a nested field of an untyped response body. */
export function field(value: unknown, ...path: Array<string | number>): unknown {
  let current = value;
  for (const key of path) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

export function stringField(value: unknown, ...path: Array<string | number>): string {
  const found = field(value, ...path);
  if (typeof found !== 'string') {
    throw new Error(`expected a string at ${path.join('.')}`);
  }
  return found;
}
