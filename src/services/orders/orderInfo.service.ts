import { REQUIRED_ORDER_FIELDS } from "../../constants/OperationConstant";
import { ValidationError } from "../../errors/remittance.errors";
import type { DynamicFields } from "../../types/remittance.types";
import type {
  OrderInfo,
  OrderInfoMinFields,
  PersonInfo,
} from "../../types/order.types";
import { isFieldMap } from "../../utils/valueGuards";

const hasField = (fields: DynamicFields, key: string): boolean =>
  isFieldMap(fields)
    ? fields.get(key) !== undefined
    : Object.prototype.hasOwnProperty.call(fields, key) &&
      fields[key] !== undefined;

/**
 * Fail fast, before any network call, listing every missing order field
 */
export const assertRequiredOrderFields = (order: DynamicFields): void => {
  const missing = REQUIRED_ORDER_FIELDS.filter((key) => !hasField(order, key));

  if (missing.length > 0) {
    throw new ValidationError(
      `OrderInfo missing required fields: ${missing.join(", ")}`,
      [...missing],
    );
  }
};

export const personMin = (
  firstName: string,
  lastName: string,
  extra: Partial<PersonInfo> = {},
): PersonInfo => ({
  FirstName: firstName,
  LastName: lastName,
  ...extra,
});

/**
 * Minimal valid OrderInfo; OrderAmount is written with two decimals
 */
export const orderInfoMin = (
  fields: OrderInfoMinFields,
  extra: Partial<OrderInfo> = {},
): OrderInfo => {
  const amount = Number(fields.OrderAmount);
  if (
    (typeof fields.OrderAmount === "string" && !fields.OrderAmount.trim()) ||
    !Number.isFinite(amount)
  ) {
    throw new ValidationError(
      `OrderAmount is not a number: ${String(fields.OrderAmount)}`,
      ["OrderAmount"],
    );
  }

  return {
    OrderDate: fields.OrderDate,
    SourceCountry: fields.SourceCountry,
    SourceBranchID: fields.SourceBranchID,
    OrderCurrency: fields.OrderCurrency,
    OrderAmount: amount.toFixed(2),
    PayoutBranchID: fields.PayoutBranchID,
    Customer: fields.Customer,
    Beneficiary: fields.Beneficiary,
    ...extra,
  };
};
