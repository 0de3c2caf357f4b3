import { runSalesReport } from "../packages/pipeline/src/index.js";

const bannerStyle = runSalesReport({ input: "examples/data/sales.csv" });
process.stdout.write(bannerStyle.output);

const listStyle = runSalesReport({
  input: "examples/data/legacy-sales.csv",
  profile: "A",
  policy: "lenient",
  top_n: 3,
});
process.stdout.write(listStyle.output);

console.log(
  `rejected ${bannerStyle.result.rejections.length} + ${listStyle.result.rejections.length} rows`
);
