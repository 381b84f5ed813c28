import type { Contract, ContractDetails, Order } from '@stoqey/ib';
import type {
  AccountSummaryEntry,
  ContractDetailsEvent,
  GatewayErrorEvent,
  OpenOrderEvent,
  OrderStatusUpdate,
  PositionEntry,
  TickPriceEvent,
  TickSizeEvent,
} from '@/domain/types';

/** ライブラリがエラーコード・リクエスト ID を付けなかった場合の値（TWS の NO_VALID_ID） */
export const NO_VALID_ID = -1;

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (isRecord(value) && isString(value.message)) {
    return new Error(value.message);
  }
  return new Error(String(value));
}

// Contract / Order / ContractDetails はすべてのフィールドが任意なので、オブジェクトであれば受け入れる
function isContract(value: unknown): value is Contract {
  return isRecord(value);
}

function isOrder(value: unknown): value is Order {
  return isRecord(value);
}

function isContractDetails(value: unknown): value is ContractDetails {
  return isRecord(value);
}

/**
 * インフラ層: @stoqey/ib のイベント引数をドメインのペイロードに変換する
 *
 * 責務: ライブラリが emit する型の付いていない引数列を検証し、CallbackSink に渡せる形にする。
 * 変換できない場合は null を返す（呼び出し側で破棄・記録する）。
 */
export class IbCallbackDecoder {
  error(args: readonly unknown[]): GatewayErrorEvent {
    const [error, code, reqId] = args;
    return {
      error: toError(error),
      code: isNumber(code) ? code : NO_VALID_ID,
      reqId: isNumber(reqId) ? reqId : NO_VALID_ID,
    };
  }

  /**
   * リクエスト ID を持たない通知（1100 接続断、2104 ファーム接続 OK など）。
   * ライブラリは error ではなく info イベントで (message, code) を通知する。
   */
  info(args: readonly unknown[]): GatewayErrorEvent | null {
    const [message, code] = args;
    if (!isString(message)) {
      return null;
    }
    return {
      error: new Error(message),
      code: isNumber(code) ? code : NO_VALID_ID,
      reqId: NO_VALID_ID,
    };
  }

  currentTime(args: readonly unknown[]): number | null {
    const [time] = args;
    return isNumber(time) ? time : null;
  }

  nextValidId(args: readonly unknown[]): number | null {
    const [orderId] = args;
    return isNumber(orderId) ? orderId : null;
  }

  /**
   * @returns アカウント ID の配列（ゲートウェイはカンマ区切りの文字列で通知する）
   */
  managedAccounts(args: readonly unknown[]): string[] | null {
    const [accountsList] = args;
    if (!isString(accountsList)) {
      return null;
    }
    return accountsList
      .split(',')
      .map((account) => account.trim())
      .filter(Boolean);
  }

  accountSummary(args: readonly unknown[]): AccountSummaryEntry | null {
    const [reqId, account, tag, value, currency] = args;
    if (!isNumber(reqId) || !isString(account) || !isString(tag) || !isString(value) || !isString(currency)) {
      return null;
    }
    return { reqId, account, tag, value, currency };
  }

  /**
   * accountSummaryEnd / contractDetailsEnd のように reqId だけを持つイベント
   */
  reqId(args: readonly unknown[]): number | null {
    const [reqId] = args;
    return isNumber(reqId) ? reqId : null;
  }

  position(args: readonly unknown[]): PositionEntry | null {
    const [account, contract, position, avgCost] = args;
    if (!isString(account) || !isContract(contract) || !isNumber(position)) {
      return null;
    }
    const entry: PositionEntry = { account, contract, position };
    if (isNumber(avgCost)) {
      entry.avgCost = avgCost;
    }
    return entry;
  }

  openOrder(args: readonly unknown[]): OpenOrderEvent | null {
    const [orderId, contract, order] = args;
    if (!isNumber(orderId) || !isContract(contract) || !isOrder(order)) {
      return null;
    }
    return { orderId, contract, order };
  }

  contractDetails(args: readonly unknown[]): ContractDetailsEvent | null {
    const [reqId, details] = args;
    if (!isNumber(reqId) || !isContractDetails(details)) {
      return null;
    }
    return { reqId, details };
  }

  orderStatus(args: readonly unknown[]): OrderStatusUpdate | null {
    const [orderId, status, filled, remaining, avgFillPrice, permId, , lastFillPrice] = args;
    if (
      !isNumber(orderId) ||
      !isString(status) ||
      !isNumber(filled) ||
      !isNumber(remaining) ||
      !isNumber(avgFillPrice)
    ) {
      return null;
    }
    const update: OrderStatusUpdate = { orderId, status, filled, remaining, avgFillPrice };
    if (isNumber(permId)) {
      update.permId = permId;
    }
    if (isNumber(lastFillPrice)) {
      update.lastFillPrice = lastFillPrice;
    }
    return update;
  }

  tickPrice(args: readonly unknown[]): TickPriceEvent | null {
    const [tickerId, field, price] = args;
    if (!isNumber(tickerId) || !isNumber(field) || !isNumber(price)) {
      return null;
    }
    return { tickerId, field, price };
  }

  tickSize(args: readonly unknown[]): TickSizeEvent | null {
    const [tickerId, field, size] = args;
    if (!isNumber(tickerId) || !isNumber(field) || !isNumber(size)) {
      return null;
    }
    return { tickerId, field, size };
  }
}
