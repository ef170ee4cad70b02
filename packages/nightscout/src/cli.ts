#!/usr/bin/env tsx
import { main } from "./program.ts";

// exitCode rather than exit(): lets piped stdout drain before the process ends
process.exitCode = await main(process.argv);
