import { Client, type AccessOptions } from "basic-ftp";
import { TransferError, errorMessage } from "../core/errors.js";
import type { Artifact, PublishAck } from "../types/manifest.js";

export type PublishDestination = {
  host: string;
  port: number;
  remoteDir: string;
  /** Explicit FTPS. */
  secure: boolean;
  /**
   * When false the server certificate is not checked. A documented trust
   * decision of the deployment, not a default to rely on.
   */
  verifyCertificate: boolean;
};

export type PublishCredentials = {
  user: string;
  password: string;
};

export interface Publisher {
  /** One attempt. Any failure surfaces as TransferError. */
  publish(artifact: Artifact, destination: PublishDestination, credentials: PublishCredentials): Promise<PublishAck>;
}

/** The part of basic-ftp's Client the publisher drives. */
export interface FtpSession {
  access(options: AccessOptions): Promise<unknown>;
  ensureDir(remoteDirPath: string): Promise<void>;
  uploadFrom(source: string, toRemotePath: string): Promise<unknown>;
  close(): void;
}

export type FtpPublisherOptions = {
  timeoutMs?: number;
  session?: () => FtpSession;
  now?: () => Date;
};

export class FtpPublisher implements Publisher {
  private readonly openSession: () => FtpSession;
  private readonly now: () => Date;

  constructor(opts: FtpPublisherOptions = {}) {
    const timeoutMs = opts.timeoutMs ?? 30_000;
    this.openSession = opts.session ?? (() => new Client(timeoutMs));
    this.now = opts.now ?? (() => new Date());
  }

  async publish(artifact: Artifact, destination: PublishDestination, credentials: PublishCredentials): Promise<PublishAck> {
    if (!destination.host) {
      throw new TransferError("Publish destination host is not configured");
    }
    if (!credentials.user || !credentials.password) {
      throw new TransferError("Publish credentials are missing");
    }

    const session = this.openSession();
    const remotePath = `${destination.remoteDir.replace(/\/+$/, "")}/${artifact.archiveName}`;
    try {
      await session.access({
        host: destination.host,
        port: destination.port,
        user: credentials.user,
        password: credentials.password,
        secure: destination.secure,
        secureOptions: { rejectUnauthorized: destination.verifyCertificate },
      });
      await session.ensureDir(destination.remoteDir);
      await session.uploadFrom(artifact.path, artifact.archiveName);
    } catch (e) {
      throw new TransferError(
        `Upload to ${destination.host}:${destination.port}${remotePath} failed: ${errorMessage(e)}`,
        { cause: e }
      );
    } finally {
      session.close();
    }

    return { remotePath, bytes: artifact.bytes, publishedAt: this.now().toISOString() };
  }
}
