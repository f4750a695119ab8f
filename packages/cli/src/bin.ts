#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { cli } from "./cli.js";

cli(hideBin(process.argv)).parseSync();
