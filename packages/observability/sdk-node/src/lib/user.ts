import type { WireUser } from '@stackwire/observability-contracts';
import { PreconditionError } from './errors';

export interface UserOptions {
  /** A unique identifier of the user */
  id?: string;
  username?: string;
  email?: string;
  ipAddress?: string;
  /** Any other user information, stored by the server but not processed */
  extras?: Record<string, unknown>;
}

/**
 * The user an event is attributed to.
 *
 * Set it on the client (`client.userContext`) to attach it to every event, or
 * per event (`Event.userContext`), which replaces the client's user as a whole
 * for that event.
 *
 * At least an `id` or an `ipAddress` is required.
 */
export class User {
  readonly id?: string;
  readonly username?: string;
  readonly email?: string;
  readonly ipAddress?: string;
  readonly extras?: Readonly<Record<string, unknown>>;

  constructor(options: UserOptions) {
    if (options.id === undefined && options.ipAddress === undefined) {
      throw new PreconditionError('User requires at least an id or an ipAddress');
    }
    this.id = options.id;
    this.username = options.username;
    this.email = options.email;
    this.ipAddress = options.ipAddress;
    this.extras = options.extras ? Object.freeze({ ...options.extras }) : undefined;
    Object.freeze(this);
  }

  toJson(): WireUser {
    const json: WireUser = {};
    if (this.id !== undefined) json.id = this.id;
    if (this.username !== undefined) json.username = this.username;
    if (this.email !== undefined) json.email = this.email;
    if (this.ipAddress !== undefined) json.ip_address = this.ipAddress;
    if (this.extras !== undefined) json.extras = { ...this.extras };
    return json;
  }
}
