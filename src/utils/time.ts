import { TAI_UTC_OFFSET_S } from '../constants/control';

/** Supplies the current TAI time in seconds. */
export type TaiClock = () => number;

export const currentTai: TaiClock = () => Date.now() / 1_000 + TAI_UTC_OFFSET_S;
