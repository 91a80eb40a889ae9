#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { runCli } from './cliProgram.js';

dotenv.config();

process.exitCode = runCli(process.argv.slice(2));
