import type { RequestIdVariables } from 'hono/request-id';
import type { Identity } from './lib/access';
import type { Logger } from './lib/logger';

export type Variables = RequestIdVariables & {
    identity?: Identity;
    logger?: Logger;  // request-scoped child logger, bound to the request id
};

export type HonoEnv = {
    Variables: Variables;
};
