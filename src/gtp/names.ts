import names from './names.json';

type NameTable = Readonly<Record<string, string>>;

const gtpv1MessageNames: NameTable = names.gtpv1Messages;
const gtpv2MessageNames: NameTable = names.gtpv2Messages;
const iev1Names: NameTable = names.iev1;
const iev2Names: NameTable = names.iev2;

function lookup(table: NameTable, code: number): string | undefined {
  return Object.prototype.hasOwnProperty.call(table, code)
    ? table[code]
    : undefined;
}

function getGTPv1MessageName(type: number): string | undefined {
  return lookup(gtpv1MessageNames, type);
}

function getGTPv2MessageName(type: number): string | undefined {
  return lookup(gtpv2MessageNames, type);
}

function getIEv1Name(type: number): string | undefined {
  return lookup(iev1Names, type);
}

function getIEv2Name(type: number): string | undefined {
  return lookup(iev2Names, type);
}

export {
  getGTPv1MessageName,
  getGTPv2MessageName,
  getIEv1Name,
  getIEv2Name,
};
