export interface RequestAuth {
  token: string;
  organizationIdentifier?: string | undefined;
}

export interface RequestHeaderOptions {
  contentType?: string | undefined;
  streaming?: boolean | undefined;
}

export const ORGANIZATION_HEADER = "OpenAI-Organization";

/**
 * Headers every API request carries
 */
export function buildRequestHeaders(
  auth: RequestAuth,
  options: RequestHeaderOptions = {},
): Record<string, string> {
  const headers: Record<string, string> = {
    "Authorization": `Bearer ${auth.token}`,
  };

  if (options.contentType) {
    headers["Content-Type"] = options.contentType;
  }

  if (auth.organizationIdentifier) {
    headers[ORGANIZATION_HEADER] = auth.organizationIdentifier;
  }

  if (options.streaming) {
    headers["Accept"] = "text/event-stream";
    headers["Cache-Control"] = "no-cache";
  }

  return headers;
}
