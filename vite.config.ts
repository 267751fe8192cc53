import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';
import tailwindcss from '@tailwindcss/vite';
import { documentsPlugin } from './src/server/documentsMiddleware';

export default defineConfig({
  plugins: [react(), tailwindcss(), documentsPlugin()],
  build: {
    outDir: 'dist',
    emptyOutDir: true
  },
  server: {
    port: 5173
  }
});
