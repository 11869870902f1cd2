import { buildOperationEnvelope } from "../connectors/Envelopes/buildSoapEnvelope";
import { MMT_NS, soapActionFor } from "../constants/OperationConstant";
import { decodeResponse } from "../parsers/dynamic-value.parser";
import { ForceListRegistry } from "../parsers/forceListRegistry";
import { findElement } from "../parsers/xml-tree.parser";
import type {
  DecodedMap,
  DynamicFields,
  OperationDescriptor,
  XmlElement,
} from "../types/remittance.types";
import type { SoapTransport } from "./soap-transport.executor";

/**
 * Payload element of a response: the vendor-namespace `Response` when
 * present, otherwise the first element whose local name mentions Response.
 */
export const locateResponsePayload = (
  root: XmlElement,
): XmlElement | undefined =>
  findElement(
    root,
    (element) =>
      element.localName === "Response" && element.namespace === MMT_NS,
  ) ?? findElement(root, (element) => element.localName.includes("Response"));

/**
 * One request/response exchange for a vendor operation
 */
export class RemittanceSoapExecutor {
  constructor(
    private readonly transport: SoapTransport,
    private readonly registry: ForceListRegistry = ForceListRegistry.defaults(),
  ) {}

  /**
   * Encode, send and decode. Resolves to undefined when the response holds
   * no payload element; callers decide which error that is.
   */
  async execute(
    descriptor: OperationDescriptor,
    params: DynamicFields,
    token?: string,
  ): Promise<DecodedMap | undefined> {
    const envelope = buildOperationEnvelope(descriptor, params, token);

    const root = await this.transport.post(
      descriptor.endpointPathKey,
      soapActionFor(descriptor),
      envelope,
    );

    const payload = locateResponsePayload(root);
    return payload ? decodeResponse(payload, this.registry) : undefined;
  }
}
