import md5 from 'md5';

export function getMD5Hash(input: string): string {
  return md5(input);
}
