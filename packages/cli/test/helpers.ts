import { mkdir, mkdtemp, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { vi } from "vitest";

/** Temp directory standing in for both the project root and HOME. */
async function makeTempProject(): Promise<string> {
	const dir = await mkdtemp(join(tmpdir(), "periodplot-cli-"));
	vi.stubEnv("HOME", dir);
	return dir;
}

async function writeJson(path: string, value: unknown): Promise<void> {
	await mkdir(join(path, ".."), { recursive: true });
	await writeFile(path, JSON.stringify(value, null, 2));
}

/** Capture everything written to a stream while a test runs. */
function captureStream(stream: NodeJS.WriteStream) {
	const spy = vi.spyOn(stream, "write").mockImplementation(() => true);
	return {
		text: (): string => spy.mock.calls.map((call) => String(call[0])).join(""),
	};
}

export { captureStream, makeTempProject, writeJson };
