/**
 * Test environment defaults, applied before each suite loads.
 */

import { setLogLevel } from '@resume-parser/shared';

setLogLevel('silent');
