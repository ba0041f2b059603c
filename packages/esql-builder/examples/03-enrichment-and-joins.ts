/**
 * Example 03: Enrichment and Joins
 *
 * This example demonstrates commands that pull in data from elsewhere:
 * - ENRICH with a policy
 * - LOOKUP JOIN against an index class
 * - DISSECT and GROK for text extraction
 */
import { esql } from "esql-builder";

// A mapped document class can stand in for its index name
class HostInventory {
  static indexName = "host_inventory";
}

export async function main(): Promise<void> {
  const enriched = esql
    .row({ language_code: "1" })
    .enrich("languages_policy")
    .on("language_code")
    .with({ name: "language_name" });
  console.log("ENRICH:\n" + enriched.render());

  const joined = esql
    .from("system_metrics")
    .lookupJoin(HostInventory)
    .on("host.name")
    .keep("host.name", "host.os", "cpu.*");
  console.log("\nLOOKUP JOIN:\n" + joined.render());

  const dissected = esql
    .row({ a: "2023-01-23T12:15:00.000Z - some text - 127.0.0.1" })
    .dissect("a", "%{date} - %{msg} - %{ip}")
    .keep("date", "msg", "ip");
  console.log("\nDISSECT:\n" + dissected.render());

  const grokked = esql
    .row({ a: "2023-01-23T12:15:00.000Z 127.0.0.1 some.email@foo.com 42" })
    .grok("a", "%{TIMESTAMP_ISO8601:date} %{IP:ip} %{EMAILADDRESS:email} %{NUMBER:num}")
    .keep("date", "ip", "email", "num");
  console.log("\nGROK:\n" + grokked.render());
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
