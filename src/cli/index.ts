#!/usr/bin/env node
import { main } from "./commands";

process.exitCode = main(process.argv.slice(2));
