import { afterEach, describe, expect, it, vi } from "vitest";
import { PeriodError } from "../src/utils/errors";
import { createLogger } from "../src/utils/logger";

afterEach(() => {
	vi.restoreAllMocks();
});

const captureStderr = () =>
	vi.spyOn(process.stderr, "write").mockImplementation(() => true);

describe("createLogger", () => {
	it("prints info messages as they are", () => {
		const stderr = captureStderr();
		createLogger("test").info("Saved 3 charts.");
		expect(stderr).toHaveBeenCalledWith("Saved 3 charts.\n");
	});

	it("prefixes warnings", () => {
		const stderr = captureStderr();
		createLogger("test").warn("odd input");
		expect(stderr).toHaveBeenCalledWith("Warning: odd input\n");
	});

	it("prints the message of an error", () => {
		const stderr = captureStderr();
		createLogger("test").error(
			new PeriodError({ message: "Cannot parse \"x\"", code: "PARSE_ERROR" }),
		);
		expect(stderr).toHaveBeenCalledWith('Error: Cannot parse "x"\n');
	});

	it("keeps debug output off stdout", () => {
		const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
		createLogger("test").debug("hidden %d", 1);
		expect(stdout).not.toHaveBeenCalled();
	});
});
