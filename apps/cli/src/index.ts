#!/usr/bin/env -S npx tsx

import { createProgram } from './program.js';

createProgram().parse();
