/**
 * URL 쿼리 파라미터 유틸리티
 * 잠금 파일에 기록되는 배포 URL 위에 인증 파라미터를 덧붙이는 데 사용
 */

/** 라이선스 키 파라미터명 */
export const LICENCE_KEY_PARAM = 'licence_key';

/** 사이트 URL 파라미터명 */
export const SITE_URL_PARAM = 'site_url';

/** 로그 출력 시 마스킹할 파라미터 */
const SECRET_PARAMS = [LICENCE_KEY_PARAM];

/**
 * 정규식 특수문자 이스케이프
 */
function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * application/x-www-form-urlencoded 방식 인코딩
 * 영숫자와 - _ . 만 그대로 두고 공백은 +로 변환
 *
 * @example
 * formUrlEncode('example.com/blog') // 'example.com%2Fblog'
 * formUrlEncode('a b~') // 'a+b%7E'
 */
export function formUrlEncode(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*~]/g, (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, '+');
}

/**
 * URL에서 &name=value 형태의 파라미터 제거
 *
 * & 뒤에 오는 파라미터만 제거됨. ?로 시작하는 첫 번째 파라미터는 그대로 남음.
 *
 * @example
 * removeParameter('https://x?a=1&b=2', 'b') // 'https://x?a=1'
 * removeParameter('https://x?a=1&b=2', 'a') // 'https://x?a=1&b=2'
 */
export function removeParameter(url: string, name: string): string {
  const pattern = new RegExp(`&${escapeRegExp(name)}=[^&]*`, 'g');
  return url.replace(pattern, '');
}

/**
 * URL 끝에 파라미터 추가
 * 같은 이름의 기존 파라미터는 먼저 제거하므로 반복 호출해도 하나만 남음
 *
 * @example
 * addParameter('https://x/y.zip', 'k', 'v') // 'https://x/y.zip?k=v'
 * addParameter('https://x/y.zip?k=v', 't', '1.2.3') // 'https://x/y.zip?k=v&t=1.2.3'
 */
export function addParameter(url: string, name: string, value: string): string {
  const cleanUrl = removeParameter(url, name);
  const joiner = cleanUrl.includes('?') ? '&' : '?';

  return `${cleanUrl}${joiner}${name}=${formUrlEncode(value)}`;
}

/**
 * 배포 URL에 라이선스 키와 사이트 URL을 추가한 다운로드용 URL 생성
 * 결과 URL은 다운로드 한 번에만 쓰이며 어디에도 저장하지 않음
 */
export function composeFetchUrl(baseUrl: string, licenceKey: string, siteUrl: string): string {
  let url = addParameter(baseUrl, LICENCE_KEY_PARAM, licenceKey);
  url = addParameter(url, SITE_URL_PARAM, siteUrl);
  return url;
}

/**
 * composeFetchUrl의 외부 공개 이름
 */
export function buildAuthenticatedUrl(
  canonicalUrl: string,
  licenceKey: string,
  siteUrl: string
): string {
  return composeFetchUrl(canonicalUrl, licenceKey, siteUrl);
}

/**
 * 로그용으로 비밀 파라미터 값을 *** 로 치환
 */
export function maskSecretParameters(url: string): string {
  return SECRET_PARAMS.reduce((masked, name) => {
    const pattern = new RegExp(`([?&]${escapeRegExp(name)}=)[^&]*`, 'g');
    return masked.replace(pattern, '$1***');
  }, url);
}
