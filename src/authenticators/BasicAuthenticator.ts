/**
 * Username/password authenticator.
 *
 * The client sends its credentials once connected; the server compares them
 * and answers with a status code, closing the connection on failure.
 */

import createDebug from 'debug';
import { Authenticator } from '../Authenticator.ts';
import { AuthRequestMessage, AuthResponseMessage } from '../messages.ts';
import type { MessageOf } from '../messages.ts';
import type { NetworkConnection } from '../NetworkConnection.ts';

const debug = createDebug('peerlink:basic-authenticator');

export const AuthCode = {
  Success: 100,
  Failure: 200,
} as const;

export interface BasicAuthenticatorOptions {
  username: string;
  password: string;
}

export class BasicAuthenticator extends Authenticator {
  private _username: string;
  private _password: string;

  constructor(options: BasicAuthenticatorOptions) {
    super();
    this._username = options.username;
    this._password = options.password;
  }

  onServerAuthenticate(conn: NetworkConnection): void {
    conn.registerHandler(AuthRequestMessage, (msg, c) => this._onAuthRequest(c, msg), false);
  }

  onClientAuthenticate(conn: NetworkConnection): void {
    conn.registerHandler(AuthResponseMessage, (msg, c) => this._onAuthResponse(c, msg), false);
    conn.send(AuthRequestMessage, { username: this._username, password: this._password });
  }

  private _onAuthRequest(conn: NetworkConnection, msg: MessageOf<typeof AuthRequestMessage>): void {
    if (conn.isAuthenticated) return;

    if (msg.username === this._username && msg.password === this._password) {
      debug('%s: authenticated %s', conn, msg.username);
      conn.send(AuthResponseMessage, { code: AuthCode.Success, message: 'Success' });
      this.serverAccept(conn);
      return;
    }

    debug('%s: rejected credentials for %s', conn, msg.username);
    // Transports flush queued sends before closing, so the client sees the code.
    conn.send(AuthResponseMessage, { code: AuthCode.Failure, message: 'Invalid Credentials' });
    this.serverReject(conn);
  }

  private _onAuthResponse(conn: NetworkConnection, msg: MessageOf<typeof AuthResponseMessage>): void {
    if (msg.code === AuthCode.Success) {
      this.clientAccept(conn);
      return;
    }

    debug('%s: authentication rejected: %s', conn, msg.message);
    this.clientReject(conn);
  }
}
