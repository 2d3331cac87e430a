/**
 * Version command - display version information.
 */

import { z } from "zod";
import pkg from "../../package.json" with { type: "json" };
import type { CliCommand, ParsedArgs } from "./base.js";

const PackageSchema = z.object({ version: z.string() });

export class VersionCommand implements CliCommand {
  name = "version";
  description = "Display version information";

  async execute(args: ParsedArgs): Promise<number> {
    const parsed = PackageSchema.safeParse(pkg);
    if (!parsed.success) {
      console.error("Failed to read version information");
      return 1;
    }

    console.log(`parley v${parsed.data.version}`);

    if (args.flags.verbose === true) {
      console.log(`Node.js ${process.version}`);
      console.log(`Platform: ${process.platform} ${process.arch}`);
    }

    return 0;
  }
}
