#!/usr/bin/env node
import "dotenv/config";

import { runLlmEvals } from "../tools/llm-evals.js";
import { runCli } from "../tools/tool-runner.js";

runCli("llm-evals", (context) => runLlmEvals(context));
