import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

export default defineConfig({
  // Relative base so the exported report folder opens straight from disk.
  base: './',
  plugins: [react()],
});
