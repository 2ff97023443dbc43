import { createLogger, errorMessage } from "main/lib/logger";
import { runCli } from "./main";

const log = createLogger("cli");

runCli(process.argv.slice(2), { stdin: process.stdin })
	.then((code) => {
		process.exitCode = code;
	})
	.catch((error) => {
		log.error(`Unexpected error: ${errorMessage(error)}`);
		process.exitCode = 1;
	});
