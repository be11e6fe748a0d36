// sysexits.h values
export const EX_OK = 0;
export const EX_USAGE = 64;
export const EX_OSERR = 71;
