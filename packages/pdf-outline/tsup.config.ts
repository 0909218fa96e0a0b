import { defineConfig } from 'tsup';

import { defineBaseConfig } from '../../tools/tsup-config/src';

export default defineConfig(defineBaseConfig());
