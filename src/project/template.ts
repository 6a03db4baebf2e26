/** Location of the sample requirements document shipped with the package */

import { fileURLToPath } from "node:url";

export const TEMPLATE_PATH = fileURLToPath(
  new URL("../../template/requirements.md", import.meta.url),
);
