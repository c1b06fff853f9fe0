import { defineConfig, loadEnv } from 'vite'
import react from '@vitejs/plugin-react'
import tailwindcss from '@tailwindcss/vite'
import path from 'path'

const buildNumber = new Date().toISOString().replace(/[-:T]/g, '').slice(0, 14); // e.g. 20260207153045

// Endpoints served by the Assistant Service; proxied in dev so the dashboard
// can run on the Vite port against a locally running service.
const SERVICE_PATHS = ['/start', '/stop', '/status', '/take-screenshot', '/sense-clipboard', '/command', '/clipboard', '/screenshot', '/qr']

export default defineConfig(({ mode }) => {
  const env = loadEnv(mode, process.cwd(), 'VITE_')
  const target = env.VITE_ASSISTANT_PROXY_TARGET || 'http://localhost:5000'

  return {
    define: {
      __BUILD_NUMBER__: JSON.stringify(buildNumber),
    },
    plugins: [react(), tailwindcss()],
    resolve: {
      alias: {
        '@': path.resolve(__dirname, './src'),
      },
    },
    server: {
      proxy: Object.fromEntries(SERVICE_PATHS.map((p) => [p, { target, changeOrigin: true }])),
    },
  }
})
