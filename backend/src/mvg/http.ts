import type { FetchLike } from "@mvgboard/core";
import { createLogger } from "../utils/logger";
import { MvgApiError } from "./errors";

export type QueryValue = string | number | boolean | null | undefined;
export type QueryArgs = Record<string, QueryValue>;

const log = createLogger("mvg-http");

const DEFAULT_CONTENT_TYPE = "application/octet-stream";

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, "");
const ensureLeadingSlash = (value: string) => (value.startsWith("/") ? value : `/${value}`);

export const buildApiUrl = (baseUrl: string, path: string, args?: QueryArgs) => {
  const searchParams = new URLSearchParams();
  Object.entries(args ?? {}).forEach(([key, value]) => {
    if (value === undefined || value === null) return;
    searchParams.set(key, String(value));
  });
  const query = searchParams.toString();
  return `${trimTrailingSlash(baseUrl)}${ensureLeadingSlash(path)}${query ? `?${query}` : ""}`;
};

/** Media type of a Content-Type header with parameters such as charset removed. */
export const parseMediaType = (header: string | null) => {
  if (!header) return DEFAULT_CONTENT_TYPE;
  const [mediaType = ""] = header.split(";");
  return mediaType.trim().toLowerCase() || DEFAULT_CONTENT_TYPE;
};

const describeFailure = (error: unknown) => {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : "";
    return `${error.name}: ${error.message}${cause}`;
  }
  return String(error);
};

const discardBody = async (response: Response, url: string) => {
  try {
    await response.arrayBuffer();
  } catch (error) {
    log.debug("Could not drain response body", { url, message: describeFailure(error) });
  }
};

/**
 * Issues a single GET against `baseUrl + path` and returns the parsed JSON body.
 * Anything but a 200 `application/json` response raises {@link MvgApiError}.
 */
export const callApi = async (
  baseUrl: string,
  path: string,
  args?: QueryArgs,
  fetchImpl: FetchLike = fetch,
): Promise<unknown> => {
  const url = buildApiUrl(baseUrl, path, args);
  log.debug("GET", { url });

  let response: Response;
  try {
    response = await fetchImpl(url, { headers: { Accept: "application/json" } });
  } catch (error) {
    throw new MvgApiError(`Bad API call: Got ${describeFailure(error)} from ${url}`, { cause: error });
  }

  if (response.status !== 200) {
    await discardBody(response, url);
    throw new MvgApiError(`Bad API call: Got response (${response.status}) from ${url}`);
  }

  const contentType = parseMediaType(response.headers.get("content-type"));
  if (contentType !== "application/json") {
    await discardBody(response, url);
    throw new MvgApiError(`Bad API call: Got content type ${contentType} from ${url}`);
  }

  try {
    const body: unknown = await response.json();
    return body;
  } catch (error) {
    throw new MvgApiError(`Bad API call: Got unreadable JSON from ${url}`, { cause: error });
  }
};
