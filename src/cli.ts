#!/usr/bin/env node
import process from "node:process";
import { runCli } from "./main.js";

void runCli(process.argv.slice(2));
