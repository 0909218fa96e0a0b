import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from '../vitest-config/src';

export default defineConfig(defineBaseConfig());
