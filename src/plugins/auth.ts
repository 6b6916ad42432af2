// ---------------------------------------------------------------------------
// HTTP Basic authentication plugin
//
// Validates the Authorization: Basic <base64(username:password)> header on
// every protected route. The password field is compared against API_KEY;
// the username is accepted but not validated.
//
// Decorates the FastifyInstance with an `authenticate` hook that routes
// attach via:  server.addHook('onRequest', server.authenticate)
// ---------------------------------------------------------------------------

import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { formatError } from '../formatter';

// ---------------------------------------------------------------------------
// TypeScript augmentation
// ---------------------------------------------------------------------------

declare module 'fastify' {
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>;
  }
}

export interface AuthPluginOptions {
  apiKey: string;
}

export const AUTH_REALM = 'Basic realm="dormant-account-cleanup"';

// ---------------------------------------------------------------------------
// Plugin
// ---------------------------------------------------------------------------

async function authPlugin(server: FastifyInstance, options: AuthPluginOptions): Promise<void> {
  server.decorate(
    'authenticate',
    async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> => {
      const authHeader = request.headers['authorization'] ?? '';

      if (!authHeader.startsWith('Basic ')) {
        return reply
          .status(401)
          .header('WWW-Authenticate', AUTH_REALM)
          .send(formatError(401, 'Authorization header with Basic credentials is required.'));
      }

      const decoded = Buffer.from(authHeader.slice(6), 'base64').toString('utf8');
      // username:password; split only on the first colon so passwords
      // containing colons are handled correctly
      const colonIndex = decoded.indexOf(':');
      const password = colonIndex === -1 ? decoded : decoded.slice(colonIndex + 1);

      if (password !== options.apiKey) {
        return reply
          .status(401)
          .header('WWW-Authenticate', AUTH_REALM)
          .send(formatError(401, 'Invalid credentials.'));
      }

      return undefined;
    },
  );
}

export default fp(authPlugin, { name: 'auth' });
