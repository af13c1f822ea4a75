// Centralized limits and guardrails for report uploads.
const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024; // 50 MB hard cap

/**
 * Upload cap in bytes; REPORTS_MAX_UPLOAD_BYTES overrides the default
 */
export function getMaxUploadBytes(): number {
  const raw = process.env.REPORTS_MAX_UPLOAD_BYTES;
  const parsed = raw ? Number(raw) : NaN;
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_MAX_UPLOAD_BYTES;
}

export const SUPPORTED_MIME_TYPES = [
  'text/csv',
  'application/vnd.ms-excel',
  'application/csv',
];
