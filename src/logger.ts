import { debuglog } from 'node:util';

/** Debug channel; enable with NODE_DEBUG=ordered-json. */
export const debug = debuglog('ordered-json');
