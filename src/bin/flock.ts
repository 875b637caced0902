import { runCli } from "../cli";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("[cli] Unexpected failure:", error);
    process.exitCode = 1;
  }
);
