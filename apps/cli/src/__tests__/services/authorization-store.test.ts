import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { AuthorizationStore, mergeAuthorizations } from "../../services/authorization-store";

describe("AuthorizationStore", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "ingress-warden-store-"));
    path = join(dir, ".env");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("load", () => {
    it("should return an empty map when the file does not exist", async () => {
      expect((await new AuthorizationStore(path).load()).size).toBe(0);
    });

    it("should return an empty map when the keys are absent", async () => {
      await writeFile(path, "AWS_REGION=us-east-2\n");
      expect((await new AuthorizationStore(path).load()).size).toBe(0);
    });

    it("should zip the list with its descriptions", async () => {
      await writeFile(
        path,
        'AUTHORIZED_IPS_LIST="203.0.113.5  0.0.0.0/0 198.51.100.9"\nAUTHORIZED_IPS_DESCRIPTIONS="Laptop Anywhere"\n'
      );

      const entries = await new AuthorizationStore(path).load();

      expect([...entries]).toEqual([
        ["203.0.113.5", "Laptop"],
        ["0.0.0.0/0", "Anywhere"],
        ["198.51.100.9", ""],
      ]);
    });
  });

  describe("save", () => {
    it("should append the managed block to a file without it", async () => {
      await writeFile(path, "AWS_REGION=us-east-2\nSECURITY_GROUP_ID=sg-gpu");
      const store = new AuthorizationStore(path);

      await store.save(
        new Map([
          ["203.0.113.5", "Laptop"],
          ["0.0.0.0/0", ""],
        ])
      );

      expect(await readFile(path, "utf8")).toBe(
        [
          "AWS_REGION=us-east-2",
          "SECURITY_GROUP_ID=sg-gpu",
          "",
          "# Security configuration (managed by ingress-warden)",
          'AUTHORIZED_IPS_LIST="203.0.113.5 0.0.0.0/0"',
          'AUTHORIZED_IPS_DESCRIPTIONS="Laptop -"',
          "SECURITY_CONFIGURED=true",
          "",
        ].join("\n")
      );
    });

    it("should replace existing lines in place and leave the rest untouched", async () => {
      await writeFile(
        path,
        'A=1\nAUTHORIZED_IPS_LIST="198.51.100.1"\nB=2\nAUTHORIZED_IPS_DESCRIPTIONS="Old"\nSECURITY_CONFIGURED=true\n'
      );

      await new AuthorizationStore(path).save(
        new Map([
          ["198.51.100.1", "Old"],
          ["198.51.100.2", "New"],
        ])
      );

      expect(await readFile(path, "utf8")).toBe(
        'A=1\nAUTHORIZED_IPS_LIST="198.51.100.1 198.51.100.2"\nB=2\nAUTHORIZED_IPS_DESCRIPTIONS="Old New"\nSECURITY_CONFIGURED=true\n'
      );
    });

    it("should insert a missing descriptions line after the list", async () => {
      await writeFile(path, 'AUTHORIZED_IPS_LIST="198.51.100.1"\n');

      await new AuthorizationStore(path).save(new Map([["198.51.100.1", "Home"]]));

      expect(await readFile(path, "utf8")).toBe(
        'AUTHORIZED_IPS_LIST="198.51.100.1"\nAUTHORIZED_IPS_DESCRIPTIONS="Home"\n'
      );
    });

    it("should replace exported and indented assignments", async () => {
      await writeFile(
        path,
        'export AUTHORIZED_IPS_LIST="198.51.100.1"\n  AUTHORIZED_IPS_DESCRIPTIONS="Old"\nA=1\n'
      );
      const store = new AuthorizationStore(path);
      expect([...(await store.load())]).toEqual([["198.51.100.1", "Old"]]);

      await store.save(
        new Map([
          ["198.51.100.1", "Old"],
          ["198.51.100.2", "New"],
        ])
      );

      expect(await readFile(path, "utf8")).toBe(
        'AUTHORIZED_IPS_LIST="198.51.100.1 198.51.100.2"\nAUTHORIZED_IPS_DESCRIPTIONS="Old New"\nA=1\n'
      );
    });

    it("should not duplicate managed lines across saves", async () => {
      await writeFile(path, "AWS_REGION=us-east-2\n");
      const store = new AuthorizationStore(path);

      await store.save(new Map([["203.0.113.5", "Laptop"]]));
      await store.save(new Map([["198.51.100.9", "Office"]]));

      const lines = (await readFile(path, "utf8")).split("\n");
      expect(lines.filter((l) => l.startsWith("AUTHORIZED_IPS_LIST="))).toEqual([
        'AUTHORIZED_IPS_LIST="198.51.100.9"',
      ]);
      expect(lines.filter((l) => l.startsWith("AUTHORIZED_IPS_DESCRIPTIONS="))).toHaveLength(1);
      expect(lines.filter((l) => l.startsWith("SECURITY_CONFIGURED="))).toHaveLength(1);
    });

    it("should load back what it saved", async () => {
      const store = new AuthorizationStore(path);
      const entries = new Map([
        ["203.0.113.5", "Laptop"],
        ["0.0.0.0/0", "Anywhere"],
      ]);

      await store.save(entries);

      expect(await store.load()).toEqual(entries);
    });
  });
});

describe("mergeAuthorizations", () => {
  it("should keep stored entries, add new ones and drop removed ones", () => {
    const current = new Map([
      ["203.0.113.5", "Laptop"],
      ["198.51.100.9", "Office"],
    ]);

    const merged = mergeAuthorizations(
      current,
      [
        { cidr: "203.0.113.5", description: "Laptop-2" },
        { cidr: "0.0.0.0/0", description: "Anywhere" },
      ],
      ["198.51.100.9"]
    );

    expect([...merged]).toEqual([
      ["203.0.113.5", "Laptop-2"],
      ["0.0.0.0/0", "Anywhere"],
    ]);
    expect(current.size).toBe(2);
  });

  it("should keep a CIDR that is both removed and re-added", () => {
    const merged = mergeAuthorizations(
      new Map([["203.0.113.5", "Laptop"]]),
      [{ cidr: "203.0.113.5", description: "Laptop" }],
      ["203.0.113.5"]
    );

    expect([...merged]).toEqual([["203.0.113.5", "Laptop"]]);
  });

  it("should drop a removed CIDR that was not re-added", () => {
    const merged = mergeAuthorizations(
      new Map([
        ["203.0.113.5", "Laptop"],
        ["0.0.0.0/0", "Anywhere"],
      ]),
      [{ cidr: "203.0.113.5", description: "Laptop" }],
      ["203.0.113.5", "0.0.0.0/0"]
    );

    expect([...merged]).toEqual([["203.0.113.5", "Laptop"]]);
  });
});
