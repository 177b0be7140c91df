#!/usr/bin/env node
import { runMain } from "./app.js";

void runMain(process.argv.slice(2));
