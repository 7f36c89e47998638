#!/usr/bin/env node
import "dotenv/config";

import { runPrSummary } from "../tools/pr-summary.js";
import { runCli } from "../tools/tool-runner.js";

runCli("pr-summary", (context) => runPrSummary(context));
