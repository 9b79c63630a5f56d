export type Paint = (text: string) => string;

export interface ReportStyle {
  bold: Paint;
  dim: Paint;
  green: Paint;
  yellow: Paint;
  red: Paint;
  cyan: Paint;
}

const identity: Paint = (text) => text;

export const plainStyle: ReportStyle = {
  bold: identity,
  dim: identity,
  green: identity,
  yellow: identity,
  red: identity,
  cyan: identity,
};
