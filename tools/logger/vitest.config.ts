import { defineConfig } from '@pagescribe/vitest-config';

export default defineConfig();
