import { devices, PlaywrightTestConfig } from "@playwright/test";
import { loadDotenv } from "./src/config";

loadDotenv(".env");

const config: PlaywrightTestConfig = {
  testDir: "./examples",
  testMatch: "*.test.ts",
  workers: 1,
  retries: 0,
  timeout: process.env.CI ? 60000 : 90000,
  fullyParallel: false,
  outputDir: "test-results",
  reporter: [["list"], ["html", { open: "never" }]],
  expect: { timeout: process.env.CI ? 10000 : 6000 },
  use: {
    headless: true,
    trace: "retain-on-failure",
    screenshot: "only-on-failure",
    video: "retain-on-failure",
    navigationTimeout: process.env.CI ? 10000 : 7000,
    actionTimeout: process.env.CI ? 10000 : 3000,
  },
  projects: [
    {
      name: "Chrome",
      use: { ...devices["Desktop Chrome"], browserName: "chromium", locale: "en" },
    },
  ],
};

export default config;
