import { defineConfig } from "@playwright/test";

const baseURL = process.env.TEST_URL || "http://localhost:3000";

export default defineConfig({
  testDir: "./tests/e2e",
  timeout: 90_000,
  expect: { timeout: 60_000 },
  use: {
    baseURL,
    colorScheme: "dark",
    screenshot: "only-on-failure",
    trace: "on-first-retry",
  },
  retries: 1,
  reporter: [["html", { open: "never" }], ["list"]],
  // Sin TEST_URL se levanta el server local; requiere un modelo accesible en AI_BASE_URL
  webServer: process.env.TEST_URL
    ? undefined
    : { command: "npm run dev", url: baseURL, reuseExistingServer: true, timeout: 120_000 },
  projects: [
    {
      name: "chromium",
      use: { browserName: "chromium", viewport: { width: 1440, height: 900 } },
    },
  ],
});
