import { cellAddressesCommand } from "./commands";
import { CommandError } from "./exec";
import type { CommandRunner } from "./exec";
import { logger } from "./logger";
import { parseFileServerAddresses } from "./parsers";

/**
 * Lists the fileservers registered in `cell`. A failing listing is logged
 * and treated as an empty cell.
 */
export async function getFileServerAddresses(cell: string, run: CommandRunner): Promise<string[]> {
  let output: string;
  try {
    output = await run(cellAddressesCommand(cell));
  } catch (error) {
    if (error instanceof CommandError) {
      logger.debug(`Listing fileservers for cell ${cell} failed: ${error.message}`);
      return [];
    }
    throw error;
  }

  const addresses = parseFileServerAddresses(output);
  logger.debug(`cell ${cell} fileservers: ${addresses.join(", ")}`);
  return addresses;
}
