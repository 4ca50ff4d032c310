#!/usr/bin/env -S node --import tsx

import { createContext } from './context.js';
import { createProgram } from './program.js';

createProgram(createContext()).parse();
