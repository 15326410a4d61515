export function normalizeText(value: string | null | undefined): string {
  return (value ?? '')
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Surname form used for equality checks: "Van der Berg" and "van-derberg" both become "vanderberg". */
export function normalizeLastName(value: string | null | undefined): string {
  return normalizeText(value).replace(/ /g, '');
}
