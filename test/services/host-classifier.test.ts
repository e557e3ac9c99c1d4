import { Address } from "../../src/services/address";
import {
  HostClassifier,
  Hostname,
} from "../../src/services/host-classifier";
import { InvalidHostError } from "../../src/models/errors";

function classifyError(raw: string): InvalidHostError {
  try {
    HostClassifier.classify(raw);
  } catch (error) {
    if (error instanceof InvalidHostError) return error;
    throw error;
  }
  throw new Error(`Expected ${JSON.stringify(raw)} to be rejected`);
}

describe("HostClassifier", () => {
  describe("IP literals", () => {
    const literals = [
      { input: "8.8.8.8", expected: "8.8.8.8" },
      { input: " 8.8.8.8 ", expected: "8.8.8.8" },
      { input: "2001:4860:4860::8888", expected: "2001:4860:4860::8888" },
      { input: "2001:4860:4860:0:0:0:0:8888", expected: "2001:4860:4860::8888" },
      { input: "[2001:db8::1]", expected: "2001:db8::1" },
      { input: "fe80::1%eth0", expected: "fe80::1" },
      { input: "::ffff:8.8.4.4", expected: "8.8.4.4" },
      { input: "0:0:0:0:0:ffff:8.8.8.8", expected: "8.8.8.8" },
      { input: "2001:db8:0:0:0:0:1.2.3.4", expected: "2001:db8::102:304" },
      { input: "1:2:3:4:5::1.2.3.4", expected: "1:2:3:4:5:0:102:304" },
    ];

    test.each(literals)(
      "should classify $input as address $expected",
      ({ input, expected }) => {
        const target = HostClassifier.classify(input);
        expect(target).toBeInstanceOf(Address);
        expect(target.toString()).toBe(expected);
      }
    );
  });

  describe("hostnames", () => {
    const hostnames = [
      { input: "example.com", expected: "example.com" },
      { input: "Example.COM", expected: "example.com" },
      { input: "example.com.", expected: "example.com" },
      { input: "localhost", expected: "localhost" },
      { input: "_service.example.org", expected: "_service.example.org" },
      { input: "bücher.example", expected: "xn--bcher-kva.example" },
    ];

    test.each(hostnames)(
      "should classify $input as hostname $expected",
      ({ input, expected }) => {
        const target = HostClassifier.classify(input);
        expect(target).toBeInstanceOf(Hostname);
        expect(target.toString()).toBe(expected);
      }
    );
  });

  describe("invalid input", () => {
    test("should reject empty input", () => {
      expect(classifyError("   ").message).toBe('Invalid host "   ": host is empty');
    });

    test("should reject overlong input", () => {
      const error = classifyError("a".repeat(256));
      expect(error.code).toBe("INVALID_HOST");
      expect(error.status).toBe(400);
      expect(error.message).toContain("host exceeds 255 characters");
    });

    test.each([
      "2001:db8:::1",
      "[8.8.8.8]",
      "[::1",
      "fe80::1%",
      "1.2.3.4%eth0",
      "::ffff:01.2.3.4",
      "[::ffff:1.2.3.04]",
    ])(
      "should reject malformed IP literal %s",
      (input) => {
        expect(classifyError(input).message).toBe(
          `Invalid host "${input}": malformed IP address`
        );
      }
    );

    test.each(["999.1.1.1", "1.2.3", "bad host", "-leading.example", "a..b"])(
      "should reject %s as neither address nor hostname",
      (input) => {
        expect(classifyError(input).message).toBe(
          `Invalid host "${input}": not an IP address or hostname`
        );
      }
    );

    test("should reject labels longer than 63 characters", () => {
      const input = `${"a".repeat(64)}.example`;
      expect(classifyError(input).message).toContain(
        "not an IP address or hostname"
      );
    });
  });

  describe("parseIpLiteral", () => {
    test("should return null for hostnames", () => {
      expect(HostClassifier.parseIpLiteral("example.com")).toBeNull();
    });

    test("should reject zones on IPv4 addresses", () => {
      expect(HostClassifier.parseIpLiteral("10.0.0.1%eth0")).toBeNull();
    });
  });
});
