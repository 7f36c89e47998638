#!/usr/bin/env node
import "dotenv/config";

import { runReleaseNotes } from "../tools/release-notes.js";
import { runCli } from "../tools/tool-runner.js";

runCli("release-notes", (context) => runReleaseNotes(context));
