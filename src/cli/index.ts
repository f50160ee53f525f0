#!/usr/bin/env node
// Fedora fixity CLI

import { createProgram } from './program.js';
import { handleError } from './utils/error-handler.js';

createProgram().parseAsync().catch(handleError);
