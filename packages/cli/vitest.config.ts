import { defineConfig } from 'vitest/config';
import { sharedVitestConfig } from '../vitest-config/src/index.js';

export default defineConfig(sharedVitestConfig);
