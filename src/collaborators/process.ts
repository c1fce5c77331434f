import type { Collaborator } from "../types.js";
import { runProgram, startDetached } from "../utils/command.js";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";

/**
 * Collaborator that runs real child processes through execa.
 */
export function createProcessCollaborator(logger: Logger = silentLogger): Collaborator {
  return {
    run(program, args, { cwd, timeoutSec }) {
      logger.debug(`run ${program} ${args.join(" ")} (cwd ${cwd}, timeout ${timeoutSec}s)`);
      return runProgram(program, args, cwd, timeoutSec);
    },
    start(program, args, { cwd }) {
      logger.debug(`start ${program} ${args.join(" ")} (cwd ${cwd})`);
      return startDetached(program, args, cwd, (err) => {
        logger.warn(`${program} exited with an error: ${errorMessage(err)}`);
      });
    }
  };
}
