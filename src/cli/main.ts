#!/usr/bin/env tsx
import { createCli } from './index';

const exitCode = await createCli().execute();
process.exitCode = exitCode;
