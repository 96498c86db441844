// Configuracion de Vitest para el panel.
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/panel/tests/**/*.test.ts'],
    setupFiles: ['apps/panel/tests/setup.ts']
  }
});
