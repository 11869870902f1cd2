import { describe, expect, it } from "vitest";

import { OPERATIONS } from "../../constants/OperationConstant";
import {
  buildAuthHeader,
  buildOperationEnvelope,
  buildSoapEnvelope,
} from "./buildSoapEnvelope";

const PROLOG =
  '<?xml version="1.0" encoding="utf-8"?>' +
  '<soap:Envelope xmlns:soap="http://schemas.xmlsoap.org/soap/envelope/" xmlns:mmt="MMT">';

describe("buildSoapEnvelope", () => {
  it("wraps header and body fragments", () => {
    expect(buildSoapEnvelope({ body: "<mmt:Ping/>", header: "<mmt:H/>" })).toBe(
      PROLOG +
        "<soap:Header><mmt:H/></soap:Header>" +
        "<soap:Body><mmt:Ping/></soap:Body>" +
        "</soap:Envelope>",
    );
  });

  it("emits an empty header by default", () => {
    expect(buildSoapEnvelope({ body: "" })).toBe(
      PROLOG + "<soap:Header></soap:Header><soap:Body></soap:Body></soap:Envelope>",
    );
  });
});

describe("buildAuthHeader", () => {
  it("escapes the token", () => {
    expect(buildAuthHeader("a<b")).toBe(
      "<mmt:AuthHeader><mmt:AccessToken>a&lt;b</mmt:AccessToken></mmt:AuthHeader>",
    );
  });

  it("is empty without a token", () => {
    expect(buildAuthHeader()).toBe("");
    expect(buildAuthHeader("")).toBe("");
  });
});

describe("buildOperationEnvelope", () => {
  it("nests the wrapper element inside the action element", () => {
    const xml = buildOperationEnvelope(
      OPERATIONS.RATES,
      { AccessKey: "test-key", Country: "CL" },
      "test-token",
    );

    expect(xml).toBe(
      PROLOG +
        "<soap:Header><mmt:AuthHeader><mmt:AccessToken>test-token</mmt:AccessToken></mmt:AuthHeader></soap:Header>" +
        "<soap:Body><mmt:AWS_API_RATES2.Execute><mmt:Rates2Request>" +
        "<mmt:AccessKey>test-key</mmt:AccessKey><mmt:Country>CL</mmt:Country>" +
        "</mmt:Rates2Request></mmt:AWS_API_RATES2.Execute></soap:Body>" +
        "</soap:Envelope>",
    );
  });

  it("sends the login request without an auth header", () => {
    const xml = buildOperationEnvelope(OPERATIONS.AUTH, {
      LoginUser: "test-user",
      LoginPass: "test-secret",
    });

    expect(xml).toBe(
      PROLOG +
        "<soap:Header></soap:Header>" +
        "<soap:Body><mmt:AWS_API_AUTH2.Execute><mmt:Logintype>" +
        "<mmt:LoginUser>test-user</mmt:LoginUser><mmt:LoginPass>test-secret</mmt:LoginPass>" +
        "</mmt:Logintype></mmt:AWS_API_AUTH2.Execute></soap:Body>" +
        "</soap:Envelope>",
    );
  });
});
