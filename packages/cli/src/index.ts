import { createProgram } from "./program.js";

await createProgram((code) => {
  process.exitCode = code;
}).parseAsync();
