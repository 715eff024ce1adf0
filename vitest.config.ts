import { mergeConfig } from 'vitest/config';

import defaultConfig from './lambdas/vitest.base.config';

export default mergeConfig(defaultConfig, {
  test: {
    include: ['lambdas/**/src/**/*.test.ts'],
  },
});
