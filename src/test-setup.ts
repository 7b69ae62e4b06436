// Test setup - runs before all tests
import { loadEnv } from '@src/lib/env/load-env.js';

// Tests use .env.test when present; a missing file is ignored
loadEnv({ path: '.env.test' });
