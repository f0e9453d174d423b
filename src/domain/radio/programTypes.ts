// RDS (European) programme type names, indexed by PTY code.
const PROGRAM_TYPE_NAMES: readonly string[] = [
  'No PTY / Undefined',
  'News',
  'Current Affairs',
  'Information',
  'Sport',
  'Education',
  'Drama',
  'Culture',
  'Science',
  'Varied',
  'Pop Music',
  'Rock Music',
  'Easy Listening',
  'Light Classical',
  'Serious Classical',
  'Other Music',
  'Weather',
  'Finance',
  "Children's",
  'Social Affairs',
  'Religion',
  'Phone-In',
  'Travel',
  'Leisure',
  'Jazz Music',
  'Country Music',
  'National Music',
  'Oldies Music',
  'Folk Music',
  'Documentary',
  'Alarm Test',
  'Alarm',
];

export function programTypeName(code: number | undefined): string {
  if (code === undefined || !Number.isInteger(code)) {
    return 'N/A';
  }
  return PROGRAM_TYPE_NAMES[code] ?? `PTY ${code}`;
}
