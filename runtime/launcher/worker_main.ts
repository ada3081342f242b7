import { runWorker } from "../../src/launcher/launcher.worker";
import { toRuntimeError } from "../error";

runWorker(process.stdin, process.stdout)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const runtimeError = toRuntimeError(error);
    console.error(`[launcher-worker] ${runtimeError.message}`);
    process.exitCode = runtimeError.exitCode;
  });
