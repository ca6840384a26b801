import type { AccessOptions } from "basic-ftp";
import { describe, expect, it } from "vitest";
import { TransferError } from "../src/core/errors.js";
import { FtpPublisher, type FtpSession } from "../src/publish/publisher.js";
import type { Artifact } from "../src/types/manifest.js";

const artifact: Artifact = {
  path: "/tmp/out/k8s-manifests.tar.gz",
  rootDir: "k8s-manifests",
  archiveName: "k8s-manifests.tar.gz",
  members: ["k8s-manifests/00-secret-cms-secrets.yaml"],
  sha256: "0".repeat(64),
  bytes: 1234,
};

const destination = {
  host: "artifacts.example.test",
  port: 21,
  remoteDir: "/releases/k8s/",
  secure: true,
  verifyCertificate: false,
};

const credentials = { user: "deploy", password: "test-secret" };

class FakeSession implements FtpSession {
  accessed: AccessOptions[] = [];
  dirs: string[] = [];
  uploads: Array<{ source: string; to: string }> = [];
  closed = 0;

  constructor(private readonly failOn?: "access" | "upload") {}

  async access(options: AccessOptions): Promise<unknown> {
    this.accessed.push(options);
    if (this.failOn === "access") throw new Error("530 Login incorrect");
    return {};
  }

  async ensureDir(remoteDirPath: string): Promise<void> {
    this.dirs.push(remoteDirPath);
  }

  async uploadFrom(source: string, toRemotePath: string): Promise<unknown> {
    this.uploads.push({ source, to: toRemotePath });
    if (this.failOn === "upload") throw new Error("550 Permission denied");
    return {};
  }

  close(): void {
    this.closed++;
  }
}

function publisherWith(session: FakeSession) {
  let opened = 0;
  const publisher = new FtpPublisher({
    session: () => {
      opened++;
      return session;
    },
    now: () => new Date("2026-01-02T03:04:05Z"),
  });
  return { publisher, opened: () => opened };
}

describe("FtpPublisher", () => {
  it("uploads the archive into the remote directory and acknowledges", async () => {
    const session = new FakeSession();
    const { publisher, opened } = publisherWith(session);

    const ack = await publisher.publish(artifact, destination, credentials);

    expect(ack).toEqual({
      remotePath: "/releases/k8s/k8s-manifests.tar.gz",
      bytes: 1234,
      publishedAt: "2026-01-02T03:04:05.000Z",
    });
    expect(opened()).toBe(1);
    expect(session.accessed).toEqual([
      {
        host: "artifacts.example.test",
        port: 21,
        user: "deploy",
        password: "test-secret",
        secure: true,
        secureOptions: { rejectUnauthorized: false },
      },
    ]);
    expect(session.dirs).toEqual(["/releases/k8s/"]);
    expect(session.uploads).toEqual([{ source: "/tmp/out/k8s-manifests.tar.gz", to: "k8s-manifests.tar.gz" }]);
    expect(session.closed).toBe(1);
  });

  it("verifies the server certificate when configured to", async () => {
    const session = new FakeSession();
    const { publisher } = publisherWith(session);
    await publisher.publish(artifact, { ...destination, verifyCertificate: true }, credentials);
    expect(session.accessed[0].secureOptions).toEqual({ rejectUnauthorized: true });
  });

  it("makes a single attempt and surfaces the failure as TransferError", async () => {
    const session = new FakeSession("upload");
    const { publisher, opened } = publisherWith(session);

    const err = await publisher.publish(artifact, destination, credentials).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransferError);
    if (err instanceof TransferError) {
      expect(err.message).toBe(
        "Upload to artifacts.example.test:21/releases/k8s/k8s-manifests.tar.gz failed: 550 Permission denied"
      );
      expect(err.retryable).toBe(true);
      expect(err.cause).toBeInstanceOf(Error);
    }
    expect(opened()).toBe(1);
    expect(session.uploads).toHaveLength(1);
    expect(session.closed).toBe(1);
  });

  it("reports an unreachable or refusing server", async () => {
    const session = new FakeSession("access");
    const { publisher } = publisherWith(session);
    await expect(publisher.publish(artifact, destination, credentials)).rejects.toThrow(/failed: 530 Login incorrect$/);
    expect(session.dirs).toEqual([]);
    expect(session.closed).toBe(1);
  });

  it("refuses to connect without a host or credentials", async () => {
    const session = new FakeSession();
    const { publisher, opened } = publisherWith(session);

    await expect(publisher.publish(artifact, { ...destination, host: "" }, credentials)).rejects.toThrow(
      "Publish destination host is not configured"
    );
    await expect(publisher.publish(artifact, destination, { user: "deploy", password: "" })).rejects.toThrow(
      "Publish credentials are missing"
    );
    expect(opened()).toBe(0);
  });
});
