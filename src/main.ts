#!/usr/bin/env node
import { Cli } from "clipanion";
import { createCli } from "./cli/program.js";
import { defaultCliContext } from "./cli/context.js";

const cli = createCli();
void cli.runExit(process.argv.slice(2), { ...Cli.defaultContext, ...defaultCliContext });
