import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { xz } from "@napi-rs/lzma";
import tar from "tar";

export const make_temp_dir = (): Promise<string> => mkdtemp(join(tmpdir(), "reservoir-pack-"));

export const remove_dir = (dir: string): Promise<void> => rm(dir, { recursive: true, force: true });

/**
 * Write `entries` into a tar archive, xz-compress it, and store it as
 * `dir/name`. Entries are added in the order given.
 */
export async function write_archive(dir: string, name: string, entries: Record<string, string>): Promise<string> {
	const source = await mkdtemp(join(dir, "src-"));
	for (const [entry, text] of Object.entries(entries)) {
		await writeFile(join(source, entry), text);
	}
	const tarball = join(dir, `${name}.tar`);
	await tar.c({ cwd: source, file: tarball }, Object.keys(entries));

	const path = join(dir, name);
	await writeFile(path, xz.compressSync(await readFile(tarball)));
	return path;
}

/** A `.tar.lzma` holding only an empty directory. */
export async function write_directory_archive(dir: string, name: string): Promise<string> {
	const source = await mkdtemp(join(dir, "src-"));
	await mkdir(join(source, "empty"));
	const tarball = join(dir, `${name}.tar`);
	await tar.c({ cwd: source, file: tarball }, ["empty"]);

	const path = join(dir, name);
	await writeFile(path, xz.compressSync(await readFile(tarball)));
	return path;
}

export const xz_bytes = (text: string): Buffer => xz.compressSync(Buffer.from(text));

/**
 * A `.tar.lzma` whose tar stream stops partway through the body of its only
 * file entry.
 */
export async function write_truncated_archive(dir: string, name: string): Promise<string> {
	const source = await mkdtemp(join(dir, "src-"));
	await writeFile(join(source, "cut.csv"), "20230615,1234567\n".repeat(64));
	const tarball = join(dir, `${name}.tar`);
	await tar.c({ cwd: source, file: tarball }, ["cut.csv"]);

	const bytes = await readFile(tarball);
	const path = join(dir, name);
	await writeFile(path, xz.compressSync(bytes.subarray(0, 512 + 100)));
	return path;
}
