import { IpUtil } from "../../src/services/ip-util";

describe("IpUtil", () => {
  describe("IPv4 operations", () => {
    describe("ipToLong and longToIp", () => {
      const testCases = [
        { ip: "0.0.0.0", long: 0 },
        { ip: "0.0.0.1", long: 1 },
        { ip: "0.0.1.0", long: 256 },
        { ip: "1.0.0.0", long: 16777216 },
        { ip: "192.168.1.1", long: 3232235777 },
        { ip: "255.255.255.255", long: 4294967295 },
        { ip: "10.0.0.1", long: 167772161 },
      ];

      test.each(testCases)(
        "should convert $ip to $long and back",
        ({ ip, long }) => {
          expect(IpUtil.ipToLong(ip)).toBe(long);
          expect(IpUtil.longToIp(long)).toBe(ip);
        }
      );
    });

    describe("isValidIpv4", () => {
      const validIPs = [
        "0.0.0.0",
        "1.2.3.4",
        "192.168.0.1",
        "255.255.255.255",
        "10.0.0.1",
        "172.16.0.1",
      ];

      const invalidIPs = [
        "",
        "not-an-ip",
        "192.168.0",
        "192.168.0.1.5",
        "192.168.0.256",
        "192.168.-1.5",
        " 192.168.0.1",
        "192.168.0.1 ",
        "010.0.0.1", // Leading zero, ambiguous octal
        "1.2.3.04",
      ];

      test.each(validIPs)("should validate IP %s as valid", (ip) => {
        expect(IpUtil.isValidIpv4(ip)).toBe(true);
      });

      test.each(invalidIPs)("should validate IP %s as invalid", (ip) => {
        expect(IpUtil.isValidIpv4(ip)).toBe(false);
      });
    });

    describe("getIpVersion", () => {
      test("should identify IPv4 addresses", () => {
        expect(IpUtil.getIpVersion("192.168.1.1")).toBe(4);
        expect(IpUtil.getIpVersion("8.8.8.8")).toBe(4);
      });

      test("should identify IPv6 addresses", () => {
        expect(IpUtil.getIpVersion("2001:db8::1")).toBe(6);
        expect(IpUtil.getIpVersion("::")).toBe(6);
      });

      test("should return null for invalid IPs", () => {
        expect(IpUtil.getIpVersion("not-an-ip")).toBeNull();
        expect(IpUtil.getIpVersion("")).toBeNull();
        expect(IpUtil.getIpVersion("999.999.999.999")).toBeNull();
      });
    });
  });

  describe("IPv6 delegation", () => {
    test("isValidIpv6 should delegate to Ipv6Util", () => {
      expect(IpUtil.isValidIpv6("2001:db8::1")).toBe(true);
      expect(IpUtil.isValidIpv6("not-an-ipv6")).toBe(false);
    });
  });
});
