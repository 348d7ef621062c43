import { vi } from "vitest";

// Mock environment variables for tests
vi.mock("@/lib/env", () => ({
  env: {
    NODE_ENV: "test",
    LOG_LEVEL: "silent",
    SCHEME_PATH: "input/scheme.txt",
  },
}));
