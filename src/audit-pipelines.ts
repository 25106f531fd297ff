#!/usr/bin/env tsx
import { runAuditCommand } from "./commands.ts";

process.exitCode = await runAuditCommand(process.argv.slice(2));
