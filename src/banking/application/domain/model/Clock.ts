/**
 * 現在時刻を返す関数
 * テストでは固定時刻を返す関数に差し替える
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
