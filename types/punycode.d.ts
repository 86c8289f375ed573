// The trailing slash selects the userland `punycode` package over Node's
// deprecated core module of the same name.
declare module 'punycode/' {
  const punycode: {
    toASCII(domain: string): string;
    toUnicode(domain: string): string;
    encode(input: string): string;
    decode(input: string): string;
  };
  export default punycode;
}
