import { CloudApiError } from "@cloudapi-double/core";
import { describe, expect, it } from "vitest";
import { SEED_IMAGES, SEED_NETWORKS } from "../seed.js";
import { fingerprintKey, memoryStore } from "../store.js";

// =============================================================================
// MEMORY STORE TESTS
// =============================================================================

const UBUNTU = "11223344-0a0a-ff99-11bb-0a1b2c3d4e5f";
const FIXED_NOW = new Date("2025-01-02T03:04:05.000Z");

function createStore() {
	return memoryStore({ now: () => FIXED_NOW });
}

async function createMachine(store = createStore()) {
	const machine = await store.createMachine({
		name: "web-1",
		package: "g4-highcpu-512M",
		image: UBUNTU,
		networks: undefined,
		metadata: { role: "web" },
		tags: { env: "test" },
	});
	if (!machine) throw new Error("machine was not created");
	return { store, machine };
}

describe("fingerprintKey", () => {
	it("returns the colon-separated md5 of the key blob", () => {
		// base64("abc") = YWJj, md5("abc") = 900150983cd24fb0d6963f7d28e17f72
		expect(fingerprintKey("ssh-rsa YWJj test@example")).toBe(
			"90:01:50:98:3c:d2:4f:b0:d6:96:3f:7d:28:e1:7f:72",
		);
	});

	it("returns an empty string for unparseable keys", () => {
		expect(fingerprintKey("not-a-key")).toBe("");
		expect(fingerprintKey("ssh-rsa %%%")).toBe("");
	});
});

describe("memoryStore", () => {
	describe("seed", () => {
		it("starts with the built-in catalog", async () => {
			const store = createStore();
			expect(await store.listImages(undefined)).toHaveLength(SEED_IMAGES.length);
			expect(await store.listNetworks()).toHaveLength(SEED_NETWORKS.length);
		});

		it("starts empty when seeding is disabled", async () => {
			const store = memoryStore({ seed: false });
			expect(await store.listImages(undefined)).toEqual([]);
			expect(await store.listPackages(undefined)).toEqual([]);
			expect(await store.listNetworks()).toEqual([]);
		});
	});

	describe("keys", () => {
		it("creates, gets, lists and deletes a key", async () => {
			const store = createStore();
			const created = await store.createKey("k1", "ssh-rsa YWJj");
			expect(created).toEqual({
				name: "k1",
				key: "ssh-rsa YWJj",
				fingerprint: "90:01:50:98:3c:d2:4f:b0:d6:96:3f:7d:28:e1:7f:72",
			});
			expect(await store.getKey("k1")).toEqual(created);
			expect(await store.listKeys()).toEqual([created]);

			await store.deleteKey("k1");
			expect(await store.listKeys()).toEqual([]);
		});

		it("rejects a duplicate key name", async () => {
			const store = createStore();
			await store.createKey("k1", "ssh-rsa YWJj");
			await expect(store.createKey("k1", "ssh-rsa YWJj")).rejects.toThrow("key k1 already exists");
		});

		it("throws NOT_FOUND for unknown keys", async () => {
			const store = createStore();
			await expect(store.getKey("missing")).rejects.toBeInstanceOf(CloudApiError);
			await expect(store.deleteKey("missing")).rejects.toThrow("key missing not found");
		});
	});

	describe("images and packages", () => {
		it("filters images by raw string fields", async () => {
			const store = createStore();
			const linux = await store.listImages({ os: "linux" });
			expect(linux?.map((i) => i.id)).toEqual([UBUNTU]);
			expect(await store.listImages({ public: "false" })).toEqual([]);
		});

		it("filters packages by numeric fields compared as strings", async () => {
			const store = createStore();
			const pkgs = await store.listPackages({ memory: "1024" });
			expect(pkgs?.map((p) => p.name)).toEqual(["g4-highcpu-1G"]);
		});

		it("gets a package by name or id", async () => {
			const store = createStore();
			expect((await store.getPackage("g4-general-4G"))?.memory).toBe(4096);
			expect((await store.getPackage("a1b2c3d4-0001-4000-8000-000000000003"))?.name).toBe(
				"g4-general-4G",
			);
		});
	});

	describe("machines", () => {
		it("creates a running machine sized from its package", async () => {
			const { machine } = await createMachine();
			expect(machine.name).toBe("web-1");
			expect(machine.state).toBe("running");
			expect(machine.type).toBe("virtualmachine");
			expect(machine.memory).toBe(512);
			expect(machine.disk).toBe(10240);
			expect(machine.ips).toEqual(["10.88.0.2"]);
			expect(machine.primaryIp).toBe("10.88.0.2");
			expect(machine.networks).toEqual(["c2d3e4f5-0002-4000-8000-000000000001"]);
			expect(machine.metadata).toEqual({ role: "web" });
			expect(machine.tags).toEqual({ env: "test" });
			expect(machine.created).toBe("2025-01-02T03:04:05.000Z");
		});

		it("uses the default package and a generated name when omitted", async () => {
			const store = createStore();
			const machine = await store.createMachine({
				name: "",
				package: "",
				image: UBUNTU,
				networks: ["net1"],
				metadata: {},
				tags: {},
			});
			expect(machine?.package).toBe("g4-highcpu-512M");
			expect(machine?.name).toBe(`machine-${machine?.id.slice(0, 8)}`);
			expect(machine?.networks).toEqual(["net1"]);
		});

		it("rejects unknown packages and images", async () => {
			const store = createStore();
			const input = { name: "", networks: undefined, metadata: {}, tags: {} };
			await expect(
				store.createMachine({ ...input, package: "nope", image: UBUNTU }),
			).rejects.toThrow("package nope not found");
			await expect(
				store.createMachine({ ...input, package: "", image: "nope" }),
			).rejects.toThrow("image nope not found");
		});

		it("counts machines and filters by tag", async () => {
			const { store } = await createMachine();
			expect(await store.countMachines()).toBe(1);
			expect(await store.listMachines({ "tag.env": "test" })).toHaveLength(1);
			expect(await store.listMachines({ "tag.env": "prod" })).toEqual([]);
		});

		it("paginates with offset and limit", async () => {
			const { store } = await createMachine();
			await store.createMachine({
				name: "web-2",
				package: "",
				image: UBUNTU,
				networks: undefined,
				metadata: {},
				tags: {},
			});
			const page = await store.listMachines({ offset: "1", limit: "1" });
			expect(page?.map((m) => m.name)).toEqual(["web-2"]);
		});

		it("walks the stop/start lifecycle", async () => {
			const { store, machine } = await createMachine();
			await store.stopMachine(machine.id);
			expect((await store.getMachine(machine.id))?.state).toBe("stopped");
			await expect(store.stopMachine(machine.id)).rejects.toThrow("not running");

			await store.startMachine(machine.id);
			expect((await store.getMachine(machine.id))?.state).toBe("running");
			await expect(store.startMachine(machine.id)).rejects.toThrow("not stopped");
		});

		it("resizes, renames and toggles the firewall", async () => {
			const { store, machine } = await createMachine();
			await store.resizeMachine(machine.id, "g4-general-4G");
			await store.renameMachine(machine.id, "db-1");
			await store.enableFirewallMachine(machine.id);

			const updated = await store.getMachine(machine.id);
			expect(updated?.package).toBe("g4-general-4G");
			expect(updated?.memory).toBe(4096);
			expect(updated?.name).toBe("db-1");
			expect(updated?.firewall_enabled).toBe(true);

			await store.disableFirewallMachine(machine.id);
			expect((await store.getMachine(machine.id))?.firewall_enabled).toBe(false);
		});

		it("returns copies that do not alias the store", async () => {
			const { store, machine } = await createMachine();
			machine.tags.env = "mutated";
			expect((await store.getMachine(machine.id))?.tags).toEqual({ env: "test" });
		});

		it("deletes machines", async () => {
			const { store, machine } = await createMachine();
			await store.deleteMachine(machine.id);
			expect(await store.countMachines()).toBe(0);
			await expect(store.getMachine(machine.id)).rejects.toThrow(`machine ${machine.id} not found`);
		});
	});

	describe("firewall rules", () => {
		it("creates, updates, toggles and deletes a rule", async () => {
			const store = createStore();
			const rule = await store.createFirewallRule("FROM any TO all vms ALLOW tcp PORT 22", false);
			if (!rule) throw new Error("rule was not created");
			expect(rule.enabled).toBe(false);

			expect((await store.enableFirewallRule(rule.id))?.enabled).toBe(true);
			expect((await store.disableFirewallRule(rule.id))?.enabled).toBe(false);

			const updated = await store.updateFirewallRule(rule.id, "FROM any TO all vms BLOCK tcp PORT 23", true);
			expect(updated).toEqual({ id: rule.id, enabled: true, rule: "FROM any TO all vms BLOCK tcp PORT 23" });

			await store.deleteFirewallRule(rule.id);
			expect(await store.listFirewallRules()).toEqual([]);
		});

		it("lists the rules that apply to a machine", async () => {
			const { store, machine } = await createMachine();
			const own = await store.createFirewallRule(`FROM any TO vm ${machine.id} ALLOW tcp PORT 80`, true);
			await store.createFirewallRule("FROM any TO vm other ALLOW tcp PORT 80", true);
			const all = await store.createFirewallRule("FROM any TO all vms ALLOW icmp TYPE 8", true);

			const rules = await store.listMachineFirewallRules(machine.id);
			expect(rules?.map((r) => r.id)).toEqual([own?.id, all?.id]);
		});
	});
});
