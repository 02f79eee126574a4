// Centralized environment bootstrap so any script/server can import once.
// Usage: import './env_bootstrap.js'; near the top of entrypoints.
import 'dotenv/config';

if (!process.env.STORE_DRIVER) {
  console.warn('[env] STORE_DRIVER not set; using the in-memory store; data is lost on restart.');
}
