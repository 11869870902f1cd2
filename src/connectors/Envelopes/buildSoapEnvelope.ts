import { encodeValue, escapeXml } from "../../builders/xml-fragment.builder";
import {
  MMT_NS,
  MMT_PREFIX,
  SOAP11_NS,
} from "../../constants/OperationConstant";
import type {
  DynamicFields,
  OperationDescriptor,
} from "../../types/remittance.types";

export interface BuildSoapEnvelopeInterface {
  body: string;
  header?: string;
}

/**
 * Wrap body and header fragments in a SOAP 1.1 envelope.
 * Fragments are assembled as-is; well-formedness is the encoder's job.
 */
export const buildSoapEnvelope = ({
  body,
  header = "",
}: BuildSoapEnvelopeInterface): string =>
  `<?xml version="1.0" encoding="utf-8"?>` +
  `<soap:Envelope xmlns:soap="${SOAP11_NS}" xmlns:${MMT_PREFIX}="${MMT_NS}">` +
  `<soap:Header>${header}</soap:Header>` +
  `<soap:Body>${body}</soap:Body>` +
  `</soap:Envelope>`;

export const buildAuthHeader = (token?: string): string =>
  token
    ? `<${MMT_PREFIX}:AuthHeader><${MMT_PREFIX}:AccessToken>${escapeXml(token)}</${MMT_PREFIX}:AccessToken></${MMT_PREFIX}:AuthHeader>`
    : "";

/**
 * Full request envelope for one vendor operation:
 * `<mmt:{action}><mmt:{wrapper}>...fields...</mmt:{wrapper}></mmt:{action}>`
 */
export const buildOperationEnvelope = (
  descriptor: OperationDescriptor,
  params: DynamicFields,
  token?: string,
): string => {
  const action = descriptor.soapActionName;
  const fields = encodeValue(params, descriptor.requestWrapperElementName);

  return buildSoapEnvelope({
    body: `<${MMT_PREFIX}:${action}>${fields}</${MMT_PREFIX}:${action}>`,
    header: buildAuthHeader(token),
  });
};
