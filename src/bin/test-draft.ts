#!/usr/bin/env node
import "dotenv/config";

import { runTestDraft } from "../tools/test-draft.js";
import { runCli } from "../tools/tool-runner.js";

runCli("test-draft", (context) => runTestDraft(context));
