/**
 * Context variables shared by the node's middleware and routes.
 */

import type { AccountId } from "@tokenledger/types";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** From request-id middleware. */
    requestId: string;
    /** From the auth middleware, secured or not. */
    auth: AuthContext;
  };
}

/** Routes behind `requireCaller()` also get the acting account. */
export interface CallerEnv {
  Variables: AppEnv["Variables"] & {
    caller: AccountId;
  };
}
