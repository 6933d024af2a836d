import { CloudApiError } from "@cloudapi-double/core";
import { describe, expect, it } from "vitest";
import { NOT_ALLOWED } from "../api/response.js";
import { MACHINE_ACTIONS } from "../api/routes/index.js";
import { createCloudApiDouble } from "../double/index.js";
import { req, stubStore } from "./helpers.js";

describe("machine actions", () => {
	it("are checked in a fixed order", () => {
		expect(MACHINE_ACTIONS.map((a) => a.name)).toEqual([
			"stop",
			"start",
			"reboot",
			"resize",
			"rename",
			"enable_firewall",
			"disable_firewall",
		]);
	});

	it.each([
		["stop", "stopMachine"],
		["start", "startMachine"],
		["reboot", "rebootMachine"],
		["enable_firewall", "enableFirewallMachine"],
		["disable_firewall", "disableFirewallMachine"],
	] as const)("%s answers 202 after calling %s", async (action, method) => {
		const { store, calls } = stubStore();
		const double = createCloudApiDouble({ account: "test", store });
		const res = await double.handle(req("POST", `/test/machines/m1?action=${action}`));
		expect(res.status).toBe(202);
		expect(res.body).toBe("");
		expect(res.headers).toEqual({ "Content-Length": "0" });
		expect(calls).toEqual([{ method, args: ["m1"] }]);
	});

	it("passes the package to resize", async () => {
		const { store, calls } = stubStore();
		const double = createCloudApiDouble({ account: "test", store });
		await double.handle(req("POST", "/test/machines/m1?action=resize&package=g4-highcpu-1G"));
		expect(calls).toEqual([{ method: "resizeMachine", args: ["m1", "g4-highcpu-1G"] }]);
	});

	it("passes the decoded name to rename", async () => {
		const { store, calls } = stubStore();
		const double = createCloudApiDouble({ account: "test", store });
		await double.handle(req("POST", "/test/machines/m1?action=rename&name=new%20name"));
		expect(calls).toEqual([{ method: "renameMachine", args: ["m1", "new name"] }]);
	});

	it("answers 405 for a missing or unknown action", async () => {
		const { store, calls } = stubStore();
		const double = createCloudApiDouble({ account: "test", store });
		expect(await double.handle(req("POST", "/test/machines/m1"))).toBe(NOT_ALLOWED);
		expect(await double.handle(req("POST", "/test/machines/m1?action=explode"))).toBe(NOT_ALLOWED);
		expect(calls).toEqual([]);
	});

	it("propagates store failures as 500", async () => {
		const { store } = stubStore({
			stopMachine: async (id) => {
				throw CloudApiError.invalidState(`machine ${id} is not running`);
			},
		});
		const double = createCloudApiDouble({ account: "test", store });
		const res = await double.handle(req("POST", "/test/machines/m1?action=stop"));
		expect(res.status).toBe(500);
		expect(res.errorText).toBe("machine m1 is not running");
	});
});
