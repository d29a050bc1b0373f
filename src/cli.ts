#!/usr/bin/env node
import { runMain } from "citty";
import sync from "./commands/sync.js";

runMain(sync);
