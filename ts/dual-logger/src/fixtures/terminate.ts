import { createLogger } from "../logger"

// Runs one terminating call against a local-only logger with the real process.exit.
const logger = createLogger({ app: "billing", module: "worker" }, { env: {} })

const done = process.argv[2] === "crit" ? logger.crit("disk full", ["free", 0]) : logger.fatalf("lost %s after %d retries", "db", 3)

done.catch((e: unknown) => {
  process.stderr.write(`unexpected: ${String(e)}\n`)
  process.exit(2)
})
