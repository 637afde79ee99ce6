#!/usr/bin/env tsx
import { GeneratePipeline } from "@sketchloom/core";
import { CLI } from "./cli";

const cli = new CLI(new GeneratePipeline(), process.stdin.isTTY ? undefined : process.stdin);
const exitCode = await cli.run(process.argv.slice(2));
process.exit(exitCode);
