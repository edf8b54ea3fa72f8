#!/usr/bin/env node

import '../packages/cli/src/index.js';
