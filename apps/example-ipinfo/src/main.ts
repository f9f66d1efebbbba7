import { runMain } from "./runner.js"

process.exitCode = await runMain(process.argv.slice(2))
