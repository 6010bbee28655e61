import { readFile, rm, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";

export const TOKEN_FILE = ".inkwell_token";

export interface TokenStore {
  readonly path: string;
  load(): Promise<string | undefined>;
  save(token: string): Promise<void>;
  clear(): Promise<void>;
}

const isMissing = (e: unknown): boolean =>
  e instanceof Error && "code" in e && e.code === "ENOENT";

/** Session token persisted between invocations, owner-readable only. */
export const createFileTokenStore = (path = join(homedir(), TOKEN_FILE)): TokenStore => ({
  path,

  async load() {
    try {
      const token = (await readFile(path, "utf8")).trim();
      return token || undefined;
    } catch (e: unknown) {
      if (isMissing(e)) return undefined;
      throw e;
    }
  },

  async save(token) {
    await writeFile(path, token, { encoding: "utf8", mode: 0o600 });
  },

  async clear() {
    await rm(path, { force: true });
  },
});
