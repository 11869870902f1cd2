import type { DynamicValue } from "./remittance.types";

// Object type aliases (not interfaces) so they stay assignable to DynamicMap.

export type AddressInfo = {
  State?: string;
  City?: string;
  StreetAndNumber?: string;
  ZipCode?: string;
  [field: string]: DynamicValue;
};

export type DocumentInfo = {
  Type?: string;
  Number?: string;
  IssueCountry?: string;
  [field: string]: DynamicValue;
};

/**
 * Customer or beneficiary of an order
 */
export type PersonInfo = {
  FirstName: string;
  LastName: string;
  MiddleName?: string;
  MaidenName?: string;
  Phone?: string;
  /** YYYY-MM-DD */
  DateOfBirth?: string;
  Activity?: string;
  Profession?: string;
  Position?: string;
  MaritalStatus?: string;
  /** "M" | "F" */
  Gender?: string;
  /** ISO 3166-1 alpha-2 */
  Nationality?: string;
  Email?: string;
  Address?: AddressInfo;
  Document?: DocumentInfo;
  PartnerId?: string;
  Relationship?: string;
  PourposeCode?: string;
  [field: string]: DynamicValue;
};

export type BankInfo = {
  BankName?: string;
  BankBranch?: string;
  /** AHO | CTE */
  BankAccType?: string;
  BankAccount?: string;
  BankDocument?: string;
  BankCity?: string;
  [field: string]: DynamicValue;
};

/**
 * Order payload sent under OrderInfo
 */
export type OrderInfo = {
  OrderId?: string;
  OrderPartnerID?: string;
  /** YYYY-MM-DD */
  OrderDate?: string;
  SourceCountry?: string;
  SourceBranchID?: string;
  OrderCurrency?: string;
  /** "100.00" */
  OrderAmount?: string;
  OrderRateID?: string;
  PayoutCountry?: string;
  PayoutBranchID?: string;
  PayoutCurrency?: string;
  PayoutAmount?: string;
  BeneMessage?: string;
  Relationship?: string;
  PourposeCode?: string;
  Customer?: PersonInfo;
  Beneficiary?: PersonInfo;
  BankInfo?: BankInfo;
  [field: string]: DynamicValue;
};

export interface OrderImportOptions {
  /** Key returned by a prior reserveKey call */
  reserveKey?: string;
}

export interface OrderInfoMinFields {
  OrderDate: string;
  SourceCountry: string;
  SourceBranchID: string;
  OrderCurrency: string;
  OrderAmount: string | number;
  PayoutBranchID: string;
  Customer: PersonInfo;
  Beneficiary: PersonInfo;
}
