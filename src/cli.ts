/**
 * Main entry point for the trip flight exporter
 */

import { runCli } from "./cli/index"

runCli().catch(console.error)
