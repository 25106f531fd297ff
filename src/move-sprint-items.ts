#!/usr/bin/env tsx
import { runMigrationCommand } from "./commands.ts";

process.exitCode = await runMigrationCommand(process.argv.slice(2));
