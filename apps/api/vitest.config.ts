import { defineConfig } from "vitest/config";
import { randomUUID } from "crypto";
import os from "os";
import path from "path";

// Config modules read env at import time.
const tmpRoot = path.join(os.tmpdir(), `filerelay-test-${randomUUID()}`);

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    env: {
      UPLOAD_TMP_DIR: tmpRoot,
      FORWARD_TIMEOUT_MS: "60000",
    },
    testTimeout: 20_000,
  },
});
