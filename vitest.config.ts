// Configuracion de Vitest para las pruebas del backend.
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/*/tests/**/*.test.ts'],
    setupFiles: ['./test-utils/setupPruebas.ts'],
    env: {
      NODE_ENV: 'test'
    },
    testTimeout: 20_000
  }
});
