// Load envs from .env
// npm run debug:bhavcopy -- 2024-01-03 [NIFTY50]
import "dotenv/config";
import { buildBhavcopyView } from "../build_view";
import { createBhavcopyDependencies } from "../dependencies";
import { createBhavcopyQuerySchema } from "../query_schema";

async function main() {
  const [date, index] = process.argv.slice(2);
  const query = createBhavcopyQuerySchema().parse({ date, index, pageSize: "25" });
  const view = await buildBhavcopyView(query, createBhavcopyDependencies());
  // Print structured result for inspection
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(view, null, 2));
}

main().catch(err => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
