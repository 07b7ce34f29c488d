#!/usr/bin/env tsx
import { cli } from "./cli.ts";

await cli.parseAsync();
