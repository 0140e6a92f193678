import { fileURLToPath } from "node:url";
import { createSummaryBuilder } from "../../src/index.js";

const indir = fileURLToPath(new URL("./virtual-organizations", import.meta.url));
const contactsFile = fileURLToPath(new URL("./contacts.yaml", import.meta.url));

const result = createSummaryBuilder({
  indir,
  contactsFile,
  authorized: true,
  debug: true,
}).buildXml();

if (result.ok) {
  console.log(result.value);
} else {
  console.error(JSON.stringify(result.error, null, 2));
  process.exitCode = 1;
}
