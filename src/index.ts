import { runCli } from "./cli";
import { errorMessage } from "./observability";

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(`fatal: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
