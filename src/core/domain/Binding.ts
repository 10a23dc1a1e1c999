/**
 * 제본 형태 (Binding) 어휘
 *
 * 닫힌 어휘: 상세 텍스트에서 아래 용어만 인식한다.
 * 배열 순서가 곧 매칭 우선순위.
 */

export const BINDING_LABELS = [
  "Hardcover",
  "Hardback",
  "Hard Cover",
  "Hard Back",
  "Paperback",
  "Softcover",
  "Soft Cover",
  "Soft Back",
  "Leather Bound",
  "Leatherbound",
  "Audio CD",
  "Audiobook",
] as const;

export type BindingLabel = (typeof BINDING_LABELS)[number];

export interface BindingTerm {
  /** 소문자 검색어 */
  term: string;
  /** 정규화된 표기 (Title Case) */
  label: BindingLabel;
}

export const BINDING_VOCABULARY: ReadonlyArray<BindingTerm> = [
  { term: "hardcover", label: "Hardcover" },
  { term: "hardback", label: "Hardback" },
  { term: "hard cover", label: "Hard Cover" },
  { term: "hard back", label: "Hard Back" },
  { term: "paperback", label: "Paperback" },
  { term: "softcover", label: "Softcover" },
  { term: "soft cover", label: "Soft Cover" },
  { term: "soft back", label: "Soft Back" },
  { term: "leather bound", label: "Leather Bound" },
  { term: "leatherbound", label: "Leatherbound" },
  { term: "audio cd", label: "Audio CD" },
  { term: "audiobook", label: "Audiobook" },
];
