import { main } from "./main"

const controller = new AbortController()

// a second Ctrl-C falls through to Node's default and exits at once
process.once("SIGINT", () => controller.abort())

process.exitCode = await main({
  argv: process.argv.slice(2),
  env: process.env,
  signal: controller.signal,
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
})
