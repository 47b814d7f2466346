import { ConfigError } from "@tunnelsocks/transport";
import { describe, expect, it } from "vitest";
import { parseCliArgs, parsePort, splitList } from "../src/index.js";

describe("parseCliArgs", () => {
	it("should leave every option undefined when nothing is given", () => {
		expect(parseCliArgs([])).toEqual({
			host: undefined,
			port: undefined,
			sourceIps: undefined,
			destIps: undefined,
			remoteListener: undefined,
			logLevel: undefined,
			configPath: undefined,
			help: false,
		});
	});

	it("should parse short and long forms", () => {
		const args = parseCliArgs([
			"-h",
			"127.0.0.1",
			"--port",
			"1080",
			"--remote-listener",
			"ssh://alice@bastion:2222",
			"-c",
			"proxy.yaml",
		]);
		expect(args.host).toBe("127.0.0.1");
		expect(args.port).toBe(1080);
		expect(args.remoteListener).toBe("ssh://alice@bastion:2222");
		expect(args.configPath).toBe("proxy.yaml");
	});

	it("should collect repeated and comma-separated IP lists", () => {
		const args = parseCliArgs(["-s", "10.0.0.5,10.0.0.6", "-s", "10.0.0.7", "--dest-ips", " 192.0.2.1 ,"]);
		expect(args.sourceIps).toEqual(["10.0.0.5", "10.0.0.6", "10.0.0.7"]);
		expect(args.destIps).toEqual(["192.0.2.1"]);
	});

	it("should map verbosity flags to log levels", () => {
		expect(parseCliArgs(["-t"]).logLevel).toBe("trace");
		expect(parseCliArgs(["--verbose"]).logLevel).toBe("debug");
		expect(parseCliArgs(["-q"]).logLevel).toBe("warning");
	});

	it("should reject conflicting verbosity flags", () => {
		expect(() => parseCliArgs(["-v", "-q"])).toThrow(ConfigError);
		expect(() => parseCliArgs(["-t", "-v"])).toThrow("only one of --trace, --verbose and --quiet may be given");
	});

	it("should recognise --help", () => {
		expect(parseCliArgs(["--help"]).help).toBe(true);
	});

	it("should turn unknown options and positionals into ConfigError", () => {
		expect(() => parseCliArgs(["--bogus"])).toThrow(ConfigError);
		expect(() => parseCliArgs(["stray"])).toThrow(ConfigError);
	});
});

describe("parsePort", () => {
	it("should accept the full port range", () => {
		expect(parsePort("0")).toBe(0);
		expect(parsePort("65535")).toBe(65535);
	});

	it("should reject out-of-range and non-numeric ports", () => {
		expect(() => parsePort("65536")).toThrow('invalid port "65536": must be an integer between 0 and 65535');
		expect(() => parsePort("-1")).toThrow(ConfigError);
		expect(() => parsePort("80a")).toThrow(ConfigError);
		expect(() => parsePort("")).toThrow(ConfigError);
	});
});

describe("splitList", () => {
	it("should pass undefined through", () => {
		expect(splitList(undefined)).toBeUndefined();
	});

	it("should return an empty list for blank input", () => {
		expect(splitList([""])).toEqual([]);
	});
});
