import type { HttpSession } from '../core/types.js';

/** Fields of a call, keyed by any name the endpoint answers to. */
export type FieldArgs = Readonly<Record<string, unknown>>;

/** Base of the API's services: a group of endpoints sharing one session. */
export abstract class Service {
  protected readonly session: HttpSession;

  constructor(session: HttpSession) {
    this.session = session;
  }
}
