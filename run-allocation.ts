import { FUND_ROLES } from "./src/models/Portfolio";
import { AllocationSession } from "./src/session/AllocationSession";

/**
 * Load a positions export, calculate the rebalancing strategy and print it.
 * Usage: npx ts-node run-allocation.ts <positions.csv> [amount-to-invest]
 * The amount may be blank or omitted, meaning $0.00 of new money.
 */
const [filePath, amountText = ""] = process.argv.slice(2);

if (!filePath) {
  console.error("Usage: ts-node run-allocation.ts <positions.csv> [amount-to-invest]");
  process.exit(1);
}

const session = new AllocationSession();

if (!session.loadFile(filePath)) {
  console.error(session.getStatus());
  process.exit(1);
}
console.log(`Loaded ${session.getStatus()}`);

const outcome = session.calculate(amountText);
if (!outcome) {
  console.error(session.getStatus());
  process.exit(1);
}

console.log(`${outcome.status} (glide path: ${outcome.result.glidePath.key})\n`);
for (const role of FUND_ROLES) {
  const recommendation = outcome.recommendations.find((r) => r.role === role);
  if (!recommendation) continue;
  const copy = session.copyAmount(role);
  console.log(copy ? `${recommendation.text}  [copy: ${copy}]` : recommendation.text);
}
console.log(`\n${outcome.table}`);
