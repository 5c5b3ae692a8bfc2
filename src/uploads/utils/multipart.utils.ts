import type {
  MultipartDescriptor,
  MultipartFileList,
} from '../types/upload-input.types';

export function isMultipartFileList(
  input: MultipartDescriptor | MultipartFileList,
): input is MultipartFileList {
  return Array.isArray(input.name);
}

/**
 * Split a multi-file upload into one descriptor per file.
 * `name` decides the file count; a missing `type` becomes '' and a missing
 * `size` becomes 0.
 */
export function expandMultipartFileList(
  list: MultipartFileList,
): MultipartDescriptor[] {
  return list.name.map((name, index) => ({
    name,
    type: list.type?.[index] ?? '',
    tmp_name: list.tmp_name?.[index] ?? null,
    path: list.path?.[index] ?? null,
    error: list.error?.[index] ?? null,
    size: list.size?.[index] ?? 0,
  }));
}
