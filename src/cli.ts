// src/cli.ts
import { errorMessage } from "./world/errors.js";
import { buildProgram } from "./program.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    process.stderr.write(errorMessage(err) + "\n");
    process.exitCode = 1;
  });
