/**
 * File-based credential storage.
 *
 * Stores each user's credential as a JSON file with restricted permissions
 * (0o600).
 * Path pattern: {basePath}/credentials/{sha256(userId)}.json
 * The user id itself lives inside the record.
 *
 * Pending authorization sessions stay in memory (see BaseCredentialStore).
 */

import createDebug from "debug";
import * as fs from "fs/promises";
import * as path from "path";
import { createHash, randomUUID } from "crypto";
import { z } from "zod";
import type { UserId } from "@app/proto";
import { BaseCredentialStore } from "./store";
import type { Credential } from "./types";

const debug = createDebug("calbot:connectors:file-store");

/** Required file permissions for credential files (owner read/write only) */
const CREDENTIAL_FILE_MODE = 0o600;

/** Required directory permissions (owner read/write/execute only) */
const CREDENTIAL_DIR_MODE = 0o700;

const credentialSchema = z.object({
  userId: z.string(),
  accessToken: z.string(),
  refreshToken: z.string(),
  accessTokenExpiresAt: z.number(),
  scopes: z.array(z.string()),
  revoked: z.boolean(),
  updatedAt: z.number(),
});

export class FileCredentialStore extends BaseCredentialStore {
  private credentialsDir: string;

  constructor(basePath: string, now?: () => number) {
    super(now);
    this.credentialsDir = path.join(basePath, "credentials");
  }

  /**
   * Fixed-length file name for any user id, whatever its length or characters.
   */
  private fileName(userId: UserId): string {
    return createHash("sha256").update(userId, "utf-8").digest("hex");
  }

  private getFilePath(userId: UserId): string {
    if (userId.length === 0) {
      throw new Error("Empty user ID");
    }
    return path.join(this.credentialsDir, `${this.fileName(userId)}.json`);
  }

  /**
   * Ensure the credentials directory exists with correct permissions.
   */
  private async ensureDir(): Promise<void> {
    await fs.mkdir(this.credentialsDir, {
      recursive: true,
      mode: CREDENTIAL_DIR_MODE,
    });

    const stat = await fs.stat(this.credentialsDir);
    const currentMode = stat.mode & 0o777;
    if (currentMode !== CREDENTIAL_DIR_MODE) {
      debug(
        "Fixing directory permissions for %s: %o -> %o",
        this.credentialsDir,
        currentMode,
        CREDENTIAL_DIR_MODE
      );
      await fs.chmod(this.credentialsDir, CREDENTIAL_DIR_MODE);
    }
  }

  /**
   * Atomic write: write to temp file, then rename.
   * A crash mid-write never leaves a truncated credential behind.
   */
  private async atomicWrite(filePath: string, content: string): Promise<void> {
    const tempPath = path.join(
      path.dirname(filePath),
      `.tmp-${randomUUID()}.json`
    );

    try {
      await fs.writeFile(tempPath, content, {
        mode: CREDENTIAL_FILE_MODE,
        encoding: "utf-8",
      });
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }

  /**
   * Audit and fix permissions on all credential files.
   * Called on startup.
   */
  async auditPermissions(): Promise<void> {
    let files: string[];
    try {
      files = await fs.readdir(this.credentialsDir);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        // Directory doesn't exist yet, that's fine
        return;
      }
      throw error;
    }

    await this.ensureDir();
    for (const file of files) {
      if (!file.endsWith(".json")) continue;
      const filePath = path.join(this.credentialsDir, file);
      const stat = await fs.stat(filePath);
      if ((stat.mode & 0o777) !== CREDENTIAL_FILE_MODE) {
        debug("Fixing file permissions for %s", filePath);
        await fs.chmod(filePath, CREDENTIAL_FILE_MODE);
      }
    }
    debug("Permission audit complete");
  }

  protected async read(userId: UserId): Promise<Credential | undefined> {
    const filePath = this.getFilePath(userId);

    let data: string;
    try {
      data = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return undefined;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch {
      debug("Credential file for %s is not valid JSON, ignoring", userId);
      return undefined;
    }

    const parsed = credentialSchema.safeParse(raw);
    if (!parsed.success || parsed.data.userId !== userId) {
      debug("Credential file for %s failed validation, ignoring", userId);
      return undefined;
    }
    return parsed.data;
  }

  protected async write(userId: UserId, credential: Credential): Promise<void> {
    await this.ensureDir();
    const filePath = this.getFilePath(userId);
    await this.atomicWrite(filePath, JSON.stringify(credential, null, 2));
    debug("Credentials saved for %s", userId);
  }

  protected async remove(userId: UserId): Promise<void> {
    await fs.rm(this.getFilePath(userId), { force: true });
    debug("Deleted credentials for %s", userId);
  }
}
