import { clearChartDir, getSetting, setSetting } from "@periodplot/chart";
import { createLogger } from "@periodplot/core";
import { ok, type ResultAsync, safeTry } from "neverthrow";
import { applyConfig, resolveConfig } from "../lib/config";
import { type CliError, fromChartError } from "../utils/errors";

const log = createLogger("clear");

export function clear(opts?: {
	chartDir?: string;
	projectRoot?: string;
}): ResultAsync<void, CliError> {
	return safeTry(async function* () {
		applyConfig(yield* resolveConfig(opts?.projectRoot));
		if (opts?.chartDir) {
			setSetting("chartDir", opts.chartDir);
		}

		const dir = getSetting("chartDir");
		const count = yield* clearChartDir().mapErr(fromChartError);
		if (count === 0) {
			log.info(`No charts to clear in ${dir}.`);
		} else {
			log.info(`Removed ${count} chart${count === 1 ? "" : "s"} from ${dir}.`);
		}
		return ok(undefined);
	});
}
