import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

export default defineConfig({
  plugins: [react()],
  server: {
    // `vercel dev` serves api/ on 3000 while vite serves the app
    proxy: {
      "/api": "http://localhost:3000",
    },
  },
});
