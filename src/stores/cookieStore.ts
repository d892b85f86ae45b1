import fs from "fs";
import path from "path";
import { z } from "zod";

const COOKIE_FILE = "cookie.json";

const savedCookieSchema = z.object({
  cookie: z.string().min(1),
  savedAt: z.string(),
});

export type SavedCookie = z.infer<typeof savedCookieSchema>;

/**
 * CookieStore keeps the Tahvel session cookie between runs,
 * so it does not have to be passed on every invocation.
 */
export class CookieStore {
  private readonly filePath: string;

  constructor(private readonly configDir: string) {
    this.filePath = path.join(configDir, COOKIE_FILE);
  }

  /**
   * Load the saved cookie. Returns null if none is saved or the file cannot be read.
   */
  load(): string | null {
    if (!fs.existsSync(this.filePath)) {
      return null;
    }

    try {
      const rawData = fs.readFileSync(this.filePath, "utf-8");
      const parsed = savedCookieSchema.safeParse(JSON.parse(rawData));
      if (!parsed.success) {
        console.warn(`⚠️  Ignoring saved cookie: ${this.filePath} has an unexpected format`);
        return null;
      }
      return parsed.data.cookie;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`⚠️  Could not load saved cookie: ${message}`);
      return null;
    }
  }

  /**
   * Save the cookie, readable only by the current user
   */
  save(cookie: string): void {
    if (!fs.existsSync(this.configDir)) {
      fs.mkdirSync(this.configDir, { recursive: true });
    }

    const data: SavedCookie = { cookie, savedAt: new Date().toISOString() };
    fs.writeFileSync(this.filePath, JSON.stringify(data, null, 2), { mode: 0o600 });
  }

  /**
   * Delete the saved cookie. Returns false if there was nothing to delete.
   */
  clear(): boolean {
    if (!fs.existsSync(this.filePath)) {
      return false;
    }
    fs.unlinkSync(this.filePath);
    return true;
  }
}
