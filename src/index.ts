#!/usr/bin/env node
import { makeResolveCommand } from "./cli/resolve";
import { createLogger } from "./utils/logger";
import { errorMessage } from "./utils/errors";

const logger = createLogger("tuneresolve", "error");

makeResolveCommand()
    .version("0.1.0")
    .parseAsync(process.argv)
    .catch((error: unknown) => {
        logger.error(errorMessage(error));
        process.exitCode = 1;
    });
