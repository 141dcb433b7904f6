import type { ChartStyle } from '../types.js';

/** Transparent background so charts can be dropped on any page. */
export const DEFAULT_STYLE: ChartStyle = {
  background:      'transparent',
  foreground:      'rgba(0, 0, 0, 0.9)',
  foregroundLight: 'rgba(0, 0, 0, 0.6)',
  gridColor:       'rgba(0, 0, 0, 0.2)',
  colors: [
    '#9999ff', '#8cedff', '#b6e354',
    '#feed6c', '#ff9966', '#ff0000',
    '#ff00cc', '#899ca1', '#bf4646',
  ],
  labelFontSize: 12,
  width:  800,
  height: 600,
};
