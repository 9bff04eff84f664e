export type FieldKind = 'text' | 'list' | 'image';

export type FieldRule = {
  /** Key in the output record. */
  field: string;
  kind: FieldKind;
  /** Label texts that identify the field on the detail page; defaults to `field`. */
  labels?: string[];
};

// Where the detail page puts each field. When the site renames a label,
// add the new text to `labels` here.
export const FIELD_RULES: FieldRule[] = [
  { field: 'Agency Name', kind: 'text', labels: ['Agency Name', 'Agency', 'Organization'] },
  { field: 'Service Name', kind: 'text', labels: ['Service Name', 'Service'] },
  { field: 'Service Description', kind: 'text', labels: ['Service Description', 'Description'] },
  { field: 'Agency Logo', kind: 'image', labels: ['Agency Logo', 'Logo'] },
  { field: 'Address', kind: 'text', labels: ['Address', 'Street Address'] },
  { field: 'City', kind: 'text' },
  { field: 'State', kind: 'text' },
  { field: 'Zip', kind: 'text', labels: ['Zip', 'Zip Code'] },
  { field: 'Phone', kind: 'text', labels: ['Phone', 'Phone Number'] },
  { field: 'Email', kind: 'text' },
  { field: 'Website', kind: 'text', labels: ['Website', 'Web Site'] },
  { field: 'Hours', kind: 'text', labels: ['Hours', 'Hours of Operation'] },
  { field: 'Eligibility', kind: 'text' },
  { field: 'Keyword(s) Associate With Service', kind: 'list', labels: ['Keyword(s) Associate With Service', 'Keywords'] },
  { field: 'Counties Available', kind: 'list', labels: ['Counties Available', 'Counties Served'] },
];
