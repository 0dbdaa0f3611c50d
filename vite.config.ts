import { defineConfig } from 'vite';
import { viteSingleFile } from 'vite-plugin-singlefile';

export default defineConfig(() => {
  // Standalone build inlines all scripts into one HTML file
  const standalone = process.env.BUILD_TARGET === 'standalone';

  return {
    plugins: standalone ? [viteSingleFile()] : [],
    build: {
      outDir: standalone ? 'dist/standalone' : 'dist/app',
    },
  };
});
