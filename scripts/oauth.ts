import http from 'node:http';
import { once } from 'node:events';
import { randomBytes } from 'node:crypto';
import { HostSchema } from '../src/config.js';
import { loadEnvFiles } from '../src/env.js';
import { buildAuthorizeUrl, exchangeAuthorizationCode } from '../src/transports/open.js';

loadEnvFiles();

const port = Number(process.env.TICKTICK_OAUTH_PORT ?? 53682);
const redirectUri = process.env.TICKTICK_REDIRECT_URI ?? `http://localhost:${port}/callback`;
const host = HostSchema.parse(process.env.TICKTICK_HOST ?? 'ticktick.com');

const clientId = process.env.TICKTICK_CLIENT_ID;
const clientSecret = process.env.TICKTICK_CLIENT_SECRET;

if (!clientId || !clientSecret) {
  console.error('Missing env vars: TICKTICK_CLIENT_ID, TICKTICK_CLIENT_SECRET');
  process.exit(2);
}

const state = randomBytes(16).toString('hex');
const authUrl = buildAuthorizeUrl({ clientId, redirectUri, state, host });

const main = async () => {
  console.log(`TickTick open API access-token helper (${host})`);
  console.log('Redirect URI:', redirectUri);
  console.log('\n1) Open this URL in your browser and authorize:');
  console.log(authUrl);

  const callbackPath = new URL(redirectUri).pathname;

  const server = http
    .createServer(async (req, res) => {
      try {
        const u = new URL(req.url ?? '/', `http://localhost:${port}`);
        if (u.pathname !== callbackPath) {
          res.writeHead(404);
          res.end('Not found');
          return;
        }

        const code = u.searchParams.get('code');
        if (u.searchParams.get('state') !== state) {
          res.writeHead(400);
          res.end('State mismatch');
          return;
        }
        if (!code) {
          res.writeHead(400);
          res.end('Missing code');
          return;
        }

        const token = await exchangeAuthorizationCode({ clientId, clientSecret, redirectUri, code, host });

        res.writeHead(200, { 'content-type': 'text/plain' });
        res.end('Done. You can close this tab and go back to your terminal.');

        console.log('\n2) Token received.');
        if (token.expires_in) console.log(`   expires in ${Math.round(token.expires_in / 86_400)} days`);
        console.log('\n3) Set env var:');
        console.log(`TICKTICK_ACCESS_TOKEN=${token.access_token}`);

        server.close();
      } catch (e) {
        res.writeHead(500);
        res.end('Internal error');
        console.error(e);
        server.close();
        process.exitCode = 1;
      }
    })
    .listen(port);

  await once(server, 'listening');
};

main().catch((e) => {
  console.error(e);
  process.exitCode = 1;
});
