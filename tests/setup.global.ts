import { vi } from 'vitest';

process.on('unhandledRejection', (reason: unknown) => {
  console.error('UNHANDLED_REJECTION', reason);
});

// The exporter only ever talks to the sink it is given. Anything reaching
// for the network from a test is a bug.
const networkBlocked = 'NETWORK BLOCKED: export tests run against in-memory sinks only.';

for (const moduleName of ['http', 'https', 'node:http', 'node:https']) {
  vi.doMock(moduleName, async (importOriginal) => {
    const actual = await importOriginal<typeof import('node:http')>();
    return {
      ...actual,
      request: () => { throw new Error(networkBlocked); },
      get: () => { throw new Error(networkBlocked); },
    };
  });
}

globalThis.fetch = async () => { throw new Error(networkBlocked); };
