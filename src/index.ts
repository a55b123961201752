/**
 * Vulnerability Policy Gate - Action Entry Point
 *
 * @module index
 */

import { run } from './action';

// Run the action
void run();
