// Lambda handler for the daily bhavcopy table.
//
// Endpoint: GET /bhavcopy
// Query params:
//   - date: yyyy-MM-dd (required), not in the future (IST)
//   - minChange, maxChange, minDelivery, maxDelivery, minVolume, minTurnover
//   - index: ALL | NIFTY50 | NIFTY100 | NIFTY200 | NIFTY500
//   - search: substring of symbol or company name
//   - sortBy, sortOrder, page, pageSize (25 | 50 | 100 | 200)
// Behavior:
//   - Returns the view model: current page, pagination, summary metrics,
//     notices and export file names. "no_data" and "error" are reported
//     in the body with status 200; only invalid input is a 400.
// Env:
//   - BHAVCOPY_* settings, see src/bhavcopy/config.ts
import { buildBhavcopyView } from "@src/bhavcopy/build_view";
import { createBhavcopyDependencies } from "@src/bhavcopy/dependencies";
import { createBhavcopyQuerySchema } from "@src/bhavcopy/query_schema";
import { withRequestContext } from "@src/util/logger";
import { ApiEvent, LambdaContext, response } from "./shared/http";

const deps = createBhavcopyDependencies();
const querySchema = createBhavcopyQuerySchema();

export const handler = async (event: ApiEvent, context: LambdaContext = {}) => {
  const logger = withRequestContext("functions/get_bhavcopy", context);
  try {
    const parsed = querySchema.safeParse(event.queryStringParameters ?? {});
    if (!parsed.success) {
      return response(400, {
        error: "invalid query",
        issues: parsed.error.flatten().fieldErrors,
      });
    }

    const view = await buildBhavcopyView(parsed.data, deps);
    logger.info(
      { tradeDate: view.tradeDate, status: view.status },
      "bhavcopy view served"
    );
    return response(200, view);
  } catch (err) {
    logger.error({ err }, "get_bhavcopy error");
    return response(500, { error: "Internal server error" });
  }
};
