import { PATHS_SANDBOX } from "../../constants/OperationConstant";
import type { EndpointKey } from "../../types/remittance.types";
import { createLogger } from "../../utils/logger";

export const TEST_HOST = "https://remit.example.test";

export const TEST_CREDENTIALS = {
  loginUser: "test-user",
  loginPass: "test-secret",
};

export const silentLogger = createLogger({ silent: true });

export const urlFor = (key: EndpointKey): string =>
  `${TEST_HOST}${PATHS_SANDBOX[key]}`;

/**
 * Server envelope with the payload under `<{action}Response xmlns="MMT">`
 */
export const soapResponse = (action: string, payload: string): string =>
  `<?xml version="1.0" encoding="utf-8"?>
<soap:Envelope xmlns:soap="http://schemas.xmlsoap.org/soap/envelope/">
  <soap:Body>
    <${action}Response xmlns="MMT">
      <Response>
        ${payload}
      </Response>
    </${action}Response>
  </soap:Body>
</soap:Envelope>`;

export const authResponse = ({
  code = "1000",
  token = "test-token",
  dueDate,
}: { code?: string; token?: string; dueDate?: string } = {}): string =>
  soapResponse(
    "AWS_API_AUTH2.Execute",
    `<ResponseCode>${code}</ResponseCode>` +
      `<AccessToken>${token}</AccessToken>` +
      (dueDate === undefined ? "" : `<DueDate>${dueDate}</DueDate>`),
  );

export const faultResponse = (faultCode: string, faultString: string) =>
  `<?xml version="1.0" encoding="utf-8"?>
<soap:Envelope xmlns:soap="http://schemas.xmlsoap.org/soap/envelope/">
  <soap:Body>
    <soap:Fault>
      <faultcode>${faultCode}</faultcode>
      <faultstring>${faultString}</faultstring>
    </soap:Fault>
  </soap:Body>
</soap:Envelope>`;
