#!/usr/bin/env node
/**
 * vphys CLI.
 *
 * Usage:
 *   vphys                      extract input/*.vphys to output/*.tri
 *   vphys extract -i maps -o out --verbose
 *   vphys inspect output/crate.tri --json
 *   vphys convert output/crate.tri -o crate.stl
 */

import { main } from "./program.js";

void main();
