import type { ArxcError } from "#errors";

/**
 * Render a diagnostic as `error[CODE]: message (at offset N)`
 */
export function formatError(error: ArxcError): string {
  return format("error", error);
}

export function formatWarning(warning: ArxcError): string {
  return format("warning", warning);
}

function format(label: string, message: ArxcError): string {
  const location = message.location
    ? ` (at offset ${message.location.offset})`
    : "";
  return `${label}[${message.code}]: ${message.message}${location}`;
}
