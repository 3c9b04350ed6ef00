import type { SplitTarget } from "./types.ts";
import { chunkedTarget } from "./chunked.ts";
import { requestParserTarget, responseParserTarget } from "./parser.ts";

export const targets: Record<string, SplitTarget> = {
  [requestParserTarget.name]: requestParserTarget,
  [responseParserTarget.name]: responseParserTarget,
  [chunkedTarget.name]: chunkedTarget,
};
