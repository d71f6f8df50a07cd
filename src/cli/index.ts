#!/usr/bin/env node
// Preflight CLI

import { createProgram } from './program.js';

createProgram().parse();
