import axios from "axios";
import { http, HttpResponse } from "msw";
import { setupServer } from "msw/node";
import {
  afterAll,
  afterEach,
  beforeAll,
  beforeEach,
  describe,
  expect,
  it,
} from "vitest";

import { PATHS_SANDBOX } from "../constants/OperationConstant";
import {
  ServerError,
  SoapFaultError,
  TransportError,
} from "../errors/remittance.errors";
import { SoapTransport } from "../executors/soap-transport.executor";
import {
  TEST_HOST,
  faultResponse,
  silentLogger,
  soapResponse,
  urlFor,
} from "./fixtures/soapResponses";

const RATES_URL = urlFor("RATES");
const OK_BODY = soapResponse(
  "AWS_API_RATES2.Execute",
  "<ResponseCode>1000</ResponseCode>",
);

const server = setupServer();

let calls = 0;

const createTransport = () =>
  new SoapTransport({
    host: TEST_HOST,
    paths: PATHS_SANDBOX,
    retry: { maxAttempts: 3, backoffFactor: 0 },
    logger: silentLogger,
  });

const post = (transport: SoapTransport) =>
  transport.post("RATES", "MMTaction/AWS_API_RATES2.Execute", "<x/>");

/**
 * Responds with each status in turn, then repeats the last one
 */
const statusSequence = (statuses: number[]) =>
  http.post(RATES_URL, () => {
    const status = statuses[Math.min(calls, statuses.length - 1)] ?? 200;
    calls++;
    return status === 200
      ? HttpResponse.xml(OK_BODY)
      : HttpResponse.text("unavailable", { status });
  });

describe("SoapTransport (integration)", () => {
  beforeAll(() => {
    server.listen({ onUnhandledRequest: "error" });
  });

  beforeEach(() => {
    calls = 0;
  });

  afterEach(() => {
    server.resetHandlers();
  });

  afterAll(() => {
    server.close();
  });

  it("sends SOAP headers and the envelope as the body", async () => {
    let headers = new Headers();
    let body = "";
    server.use(
      http.post(RATES_URL, async ({ request }) => {
        headers = request.headers;
        body = await request.text();
        return HttpResponse.xml(OK_BODY);
      }),
    );

    const root = await post(createTransport());

    expect(root.localName).toBe("Envelope");
    expect(body).toBe("<x/>");
    expect(headers.get("content-type")).toBe(
      "text/xml; charset=utf-8",
    );
    expect(headers.get("soapaction")).toBe(
      "MMTaction/AWS_API_RATES2.Execute",
    );
    expect(headers.get("x-request-id")).toMatch(
      /^[0-9a-f-]{36}$/,
    );
  });

  it("succeeds on the third POST after two 503s", async () => {
    server.use(statusSequence([503, 503, 200]));

    const root = await post(createTransport());

    expect(root.localName).toBe("Envelope");
    expect(calls).toBe(3);
  });

  it("raises ServerError once the retry budget is spent", async () => {
    server.use(statusSequence([503]));

    const error = await post(createTransport()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServerError);
    expect(calls).toBe(3);
    if (!(error instanceof ServerError)) return;
    expect(error.statusCode).toBe(503);
    expect(error.message).toBe(`HTTP 503 at ${RATES_URL}`);
  });

  it("keeps each transport's retry budget on a shared axios instance", async () => {
    server.use(statusSequence([503]));
    const httpClient = axios.create({ responseType: "text" });
    const transportFor = (maxAttempts: number) =>
      new SoapTransport({
        host: TEST_HOST,
        paths: PATHS_SANDBOX,
        retry: { maxAttempts, backoffFactor: 0 },
        httpClient,
        logger: silentLogger,
      });

    const wide = transportFor(3);
    const narrow = transportFor(2);

    await expect(post(narrow)).rejects.toBeInstanceOf(ServerError);
    expect(calls).toBe(2);

    calls = 0;
    await expect(post(wide)).rejects.toBeInstanceOf(ServerError);
    expect(calls).toBe(3);
  });

  it("does not retry a client error status", async () => {
    server.use(statusSequence([400]));

    await expect(post(createTransport())).rejects.toBeInstanceOf(ServerError);
    expect(calls).toBe(1);
  });

  it("raises TransportError when no response ever arrives", async () => {
    server.use(
      http.post(RATES_URL, () => {
        calls++;
        return HttpResponse.error();
      }),
    );

    const error = await post(createTransport()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(calls).toBe(3);
    if (!(error instanceof TransportError)) return;
    expect(error.url).toBe(RATES_URL);
  });

  it("raises ServerError for a body that is not XML", async () => {
    server.use(http.post(RATES_URL, () => HttpResponse.text("not xml")));

    const error = await post(createTransport()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServerError);
    if (!(error instanceof ServerError)) return;
    expect(error.statusCode).toBe(200);
    expect(error.message.startsWith(`Invalid XML from ${RATES_URL}: `)).toBe(
      true,
    );
  });

  it("raises ServerError for an empty body", async () => {
    server.use(http.post(RATES_URL, () => HttpResponse.text("")));

    await expect(post(createTransport())).rejects.toBeInstanceOf(ServerError);
  });

  it("raises SoapFaultError for a fault with status 200", async () => {
    server.use(
      http.post(RATES_URL, () =>
        HttpResponse.xml(faultResponse("soap:Server", "Internal failure")),
      ),
    );

    const error = await post(createTransport()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SoapFaultError);
    if (!(error instanceof SoapFaultError)) return;
    expect(error.faultCode).toBe("soap:Server");
    expect(error.faultString).toBe("Internal failure");
    expect(error.message).toBe("soap:Server: Internal failure");
  });

  it("reports the status before the fault for a 500 response", async () => {
    server.use(
      http.post(RATES_URL, () => {
        calls++;
        return HttpResponse.xml(faultResponse("soap:Server", "Down"), {
          status: 500,
        });
      }),
    );

    const error = await post(createTransport()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServerError);
    expect(calls).toBe(3);
  });
});
