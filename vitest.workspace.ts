import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'Shared/vitest.config.ts',
  'Sandbox-Protocol/vitest.config.ts',
]);
