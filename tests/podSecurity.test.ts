import { describe, expect, it } from "vitest";
import { classifyPod, worstTier } from "../src/analyzer/topology/podSecurity";
import { cpuMillicores, memoryMiB, parseQuantity } from "../src/analyzer/topology/quantity";
import { pod } from "./fixtures/fakeCluster";

const hardened = { runAsNonRoot: true, allowPrivilegeEscalation: false };

describe("classifyPod", () => {
  it("flags host namespaces as privileged", () => {
    expect(classifyPod(pod("p", "ns", {}, { spec: { hostNetwork: true } }))).toBe("privileged");
    expect(classifyPod(pod("p", "ns", {}, { spec: { hostPID: true } }))).toBe("privileged");
  });

  it("flags privileged init containers", () => {
    const p = pod("p", "ns", {}, {
      spec: { initContainers: [{ name: "setup", securityContext: { privileged: true } }] }
    });
    expect(classifyPod(p)).toBe("privileged");
  });

  it("is restricted when every container is hardened", () => {
    const p = pod("p", "ns", {}, {
      containers: [
        { name: "a", securityContext: hardened },
        { name: "b", securityContext: hardened }
      ]
    });
    expect(classifyPod(p)).toBe("restricted");
  });

  it("inherits runAsNonRoot from the pod", () => {
    const p = pod("p", "ns", {}, {
      containers: [{ name: "a", securityContext: { allowPrivilegeEscalation: false } }],
      spec: { securityContext: { runAsNonRoot: true } }
    });
    expect(classifyPod(p)).toBe("restricted");
  });

  it("is baseline when a container has no security context", () => {
    const p = pod("p", "ns", {}, {
      containers: [{ name: "a", securityContext: hardened }, { name: "b" }]
    });
    expect(classifyPod(p)).toBe("baseline");
  });
});

describe("worstTier", () => {
  it("lets privileged win across pods", () => {
    expect(worstTier(["restricted", "privileged", "baseline"])).toBe("privileged");
    expect(worstTier(["restricted", "restricted"])).toBe("restricted");
    expect(worstTier([])).toBe("baseline");
  });
});

describe("quantities", () => {
  it("parses decimal and binary suffixes", () => {
    expect(parseQuantity("250m")).toBeCloseTo(0.25);
    expect(parseQuantity("2")).toBe(2);
    expect(parseQuantity("1Ki")).toBe(1024);
    expect(parseQuantity("1e3")).toBe(1000);
    expect(parseQuantity("bogus")).toBe(0);
    expect(parseQuantity(undefined)).toBe(0);
  });

  it("converts to millicores and MiB", () => {
    expect(cpuMillicores("500m")).toBe(500);
    expect(cpuMillicores("1.5")).toBe(1500);
    expect(memoryMiB("512Mi")).toBe(512);
    expect(memoryMiB("1Gi")).toBe(1024);
  });
});
