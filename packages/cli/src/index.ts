import ReqgateCommand from "./cli";

const readExitCode = (error: unknown) =>
  typeof error === "object" &&
  error !== null &&
  "exitCode" in error &&
  typeof error.exitCode === "number"
    ? error.exitCode
    : 1;

ReqgateCommand.run(process.argv.slice(2))
  .then(() => {
    process.exit();
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    process.exit(readExitCode(error));
  });
