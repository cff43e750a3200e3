/**
 * Request schemas for the HTTP surface. Amounts are decimal wei strings.
 */

import { Type, type Static } from "@sinclair/typebox";
import { AddressSchema, AmountString } from "@emberstake/emission";

export const AmountBody = Type.Object({ account: AddressSchema, amount: AmountString });
export type AmountBody = Static<typeof AmountBody>;

export const AccountBody = Type.Object({ account: AddressSchema });
export type AccountBody = Static<typeof AccountBody>;

export const CallerBody = Type.Object({ caller: AddressSchema });
export type CallerBody = Static<typeof CallerBody>;

export const ShieldBody = Type.Object({ caller: AddressSchema, account: AddressSchema });
export type ShieldBody = Static<typeof ShieldBody>;

export const AccountParams = Type.Object({ id: AddressSchema });
export type AccountParams = Static<typeof AccountParams>;

export const HolderParams = Type.Object({ holder: AddressSchema });
export type HolderParams = Static<typeof HolderParams>;

export const RecordParams = Type.Object({ id: Type.Integer({ minimum: 1 }) });
export type RecordParams = Static<typeof RecordParams>;

export const EventsQuery = Type.Object({
  from: Type.Optional(Type.Integer({ minimum: 0 })),
  type: Type.Optional(Type.String()),
});
export type EventsQuery = Static<typeof EventsQuery>;

export const TransferBody = Type.Object({ from: AddressSchema, to: AddressSchema, amount: AmountString });
export type TransferBody = Static<typeof TransferBody>;

export const ApproveBody = Type.Object({ owner: AddressSchema, spender: AddressSchema, amount: AmountString });
export type ApproveBody = Static<typeof ApproveBody>;
