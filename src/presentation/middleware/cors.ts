/**
 * CORS handling: origin validation, preflight support.
 * Returns headers to merge, or null if origin is rejected.
 */
export const corsHeaders = (
  allowedOrigins: readonly string[],
  requestOrigin: string | null,
): Record<string, string> | null => {
  if (requestOrigin === null) return null;

  const isAllowed = allowedOrigins.includes("*") || allowedOrigins.includes(requestOrigin);
  if (!isAllowed) return null;

  return {
    "Access-Control-Allow-Origin": requestOrigin,
    "Access-Control-Allow-Credentials": "true",
    "Access-Control-Allow-Methods": "GET, POST, PUT, DELETE, OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type, Authorization, X-Request-Id",
    "Access-Control-Max-Age": "86400",
    Vary: "Origin",
  };
};

/** Returns a 204 preflight response or null if not a preflight */
export const handlePreflight = (allowedOrigins: readonly string[], req: Request): Response | null => {
  if (req.method !== "OPTIONS") return null;

  const headers = corsHeaders(allowedOrigins, req.headers.get("origin"));
  if (!headers) return new Response(null, { status: 403 });
  return new Response(null, { status: 204, headers });
};
