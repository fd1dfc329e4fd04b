import { pino } from 'pino';

export const silentLogger = pino({ level: 'silent' });

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

export function textResponse(body: string, status: number): Response {
  return new Response(body, { status });
}

export function mockFetch(...responses: Response[]): jest.Mock<Promise<Response>, Parameters<typeof fetch>> {
  const fn = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
  for (const response of responses) {
    fn.mockResolvedValueOnce(response);
  }
  return fn;
}
