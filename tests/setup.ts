/**
 * Jest setup: quiet logs and keep every test away from the real ~/.inferhost.
 */

import * as os from "os";
import * as path from "path";

// Individual tests can override with INFERHOST_LOG_LEVEL=debug
process.env.INFERHOST_LOG_LEVEL ??= "error";
process.env.INFERHOST_ROOT ??= path.join(os.tmpdir(), `inferhost-jest-${process.pid}`);
