import { createServer, type IncomingMessage, type Server } from 'http';
import chalk from 'chalk';
import { routeSupervisorRequest, type DeskRuntime } from '@deskloop/runtime';
import { buildRuntime, fail, type GlobalOptions } from '../lib/runtime-factory.js';

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.setEncoding('utf8');
    req.on('data', (chunk: string) => body += chunk);
    req.on('end', () => resolve(body));
    req.on('error', reject);
  });
}

/**
 * HTTP server exposing the supervisor API on a local port
 */
export function createSupervisorServer(runtime: DeskRuntime): Server {
  return createServer(async (req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');

    try {
      const response = await routeSupervisorRequest(runtime, {
        method: req.method ?? 'GET',
        path: url.pathname,
        query: Object.fromEntries(url.searchParams),
        body: await readBody(req),
      });

      console.log(chalk.gray(`${req.method} ${url.pathname} → ${response.statusCode}`));
      res.writeHead(response.statusCode, response.headers);
      res.end(response.body);
    } catch (error) {
      res.writeHead(500, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ success: false, message: error instanceof Error ? error.message : 'Unknown error' }));
    }
  });
}

export async function serveCommand(options: { port: string }, globals: GlobalOptions): Promise<void> {
  try {
    const runtime = await buildRuntime(globals);
    const port = parseInt(options.port, 10);
    const server = createSupervisorServer(runtime);

    server.listen(port, () => {
      console.log(chalk.blue(`🧑‍💼 Supervisor API listening on http://localhost:${port}/api`));
      console.log(chalk.gray('   GET  /api/requests/pending'));
      console.log(chalk.gray('   POST /api/requests/{id}/resolve  {"answer": "..."}'));
      console.log(chalk.gray('   GET  /api/knowledge, /api/stats, /api/calls'));
    });
  } catch (error) {
    fail('Failed to start server', error, globals.debug);
  }
}
