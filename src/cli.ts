#!/usr/bin/env node
import { main } from "./program.js";

process.exitCode = await main(process.argv, {
	cwd: process.cwd(),
	write: (line) => process.stdout.write(line + "\n"),
	writeError: (line) => process.stderr.write(line + "\n"),
});
