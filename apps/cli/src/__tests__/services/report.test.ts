import type { Report } from "@ingress-warden/shared";
import { describe, it, expect } from "vitest";
import { formatListing, formatPortInfo, formatReport } from "../../services/report";
import { createBuildboxTarget } from "../helpers";

function createReport(overrides: Partial<Report> = {}): Report {
  return {
    targetId: "sg-gpu",
    displayName: "GPU Instance",
    removals: [],
    additions: [],
    skipped: [],
    publicPorts: [],
    accessByCidr: { "203.0.113.5": [22, 8000, 50051], "10.0.0.0/24": [22] },
    cidrsByPort: { 22: ["10.0.0.0/24", "203.0.113.5/32"], 50051: ["203.0.113.5/32"], 8000: ["203.0.113.5/32"] },
    failures: 0,
    ...overrides,
  };
}

describe("report", () => {
  describe("formatPortInfo", () => {
    it("should mark public ports", () => {
      expect(formatPortInfo(createBuildboxTarget())).toEqual([
        "  Port 22 - SSH",
        "  Port 8443 - WebSocket Bridge (WSS) [public]",
        "  Port 8444 - HTTPS Demo Server [public]",
      ]);
    });
  });

  describe("formatListing", () => {
    it("should number entries in state order with their descriptions", () => {
      const state = new Map([
        ["203.0.113.5", new Set([50051, 22, 8000])],
        ["0.0.0.0/0", new Set([8443])],
      ]);

      const listing = formatListing(state, new Map([["203.0.113.5", "Laptop"]]));

      expect(listing.cidrs).toEqual(["203.0.113.5", "0.0.0.0/0"]);
      expect(listing.lines).toEqual([
        "   1. 203.0.113.5        Ports: 22 8000 50051                  (Laptop)",
        "   2. 0.0.0.0/0          Ports: 8443",
      ]);
    });
  });

  describe("formatReport", () => {
    it("should list rules by port and access by address", () => {
      expect(formatReport(createReport())).toEqual([
        "GPU Instance (sg-gpu) final configuration",
        "Configured Security Rules:",
        "  Port 22: 10.0.0.0/24, 203.0.113.5/32",
        "  Port 8000: 203.0.113.5/32",
        "  Port 50051: 203.0.113.5/32",
        "Summary by IP Address:",
        "  203.0.113.5: ports 22 8000 50051",
        "  10.0.0.0/24: ports 22",
      ]);
    });

    it("should show empty ports and no addresses", () => {
      const lines = formatReport(createReport({ accessByCidr: {}, cidrsByPort: { 22: [] } }));
      expect(lines).toEqual([
        "GPU Instance (sg-gpu) final configuration",
        "Configured Security Rules:",
        "  Port 22: (none)",
        "Summary by IP Address:",
        "  (no addresses)",
      ]);
    });

    it("should report an unreadable final state and failures", () => {
      const lines = formatReport(createReport({ queryError: "Throttling", failures: 2 }));
      expect(lines).toEqual([
        "GPU Instance (sg-gpu) final configuration",
        "  Could not read final rules: Throttling",
        "  ✗ 2 rule change(s) failed; re-run to retry",
      ]);
    });
  });
});
