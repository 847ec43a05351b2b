/**
 * @fileoverview The dispatch table: one handler for every function code.
 */

import { arithmeticHandlers } from './execute-arith';
import { controlHandlers } from './execute-control';
import { extraHandlers } from './execute-extra';
import { storeHandlers } from './execute-store';
import { InstructionTable } from './execute-types';

export const instructionTable: InstructionTable = {
  ...arithmeticHandlers,
  ...storeHandlers,
  ...controlHandlers,
  ...extraHandlers,
};
