import { runCli } from "../cli/program";
import { describeError } from "../application/errors";

runCli().catch((err) => {
  console.error(describeError(err));
  process.exit(1);
});
