import { runAction } from "./action/main.ts";

// SIGINT/SIGTERM cancel the run; in-flight calls see the aborted signal
const controller = new AbortController();
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => controller.abort(new Error(`Received ${signal}`)));
}

const exitCode = await runAction({ env: process.env, signal: controller.signal });
process.exit(exitCode);
