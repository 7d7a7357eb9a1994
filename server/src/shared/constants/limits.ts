/**
 * limits.ts — Business constraints and default timings.
 *
 * Values that operators may tune (grace window, doctor connect timeout,
 * sweep interval) are only defaults here; config/settings.ts reads the
 * environment overrides.
 */
export const LIMITS = {
  /** Interval clients are told to poll the status endpoint at */
  STATUS_POLL_INTERVAL_MS: 3_000,

  DEFAULT_GRACE_WINDOW_MS: 60_000,
  DEFAULT_DOCTOR_CONNECT_TIMEOUT_MS: 120_000,
  DEFAULT_WATCHDOG_SWEEP_MS: 30_000,

  SOCKET_PING_INTERVAL: 10_000,
  SOCKET_PING_TIMEOUT: 15_000,
  SOCKET_MAX_BUFFER_BYTES: 256 * 1024,

  APPOINTMENT_ID_MAX_LENGTH: 64,
  /** SDP blobs comfortably fit; anything larger is not a signaling frame */
  SIGNAL_PAYLOAD_MAX_BYTES: 64 * 1024,

  GENERAL_RATE_LIMIT: 100,
  STATUS_POLL_RATE_LIMIT: 60,

  SHUTDOWN_GRACE_MS: 10_000,
} as const;
