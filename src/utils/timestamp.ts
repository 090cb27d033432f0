/**
 * 타임스탬프 유틸리티
 *
 * 로그 및 실행 요약에 사용하는 로컬 타임존 기준 시각 문자열
 */

const pad = (value: number, width = 2): string =>
  String(value).padStart(width, "0");

/**
 * 타임존 정보가 포함된 ISO 8601 타임스탬프
 * 예: 2025-10-30T12:34:56.789+09:00
 *
 * TZ 환경 변수 기준 오프셋을 사용한다.
 */
export function getTimestampWithTimezone(now: Date = new Date()): string {
  const offset = -now.getTimezoneOffset();
  const sign = offset >= 0 ? "+" : "-";
  const offsetHours = pad(Math.floor(Math.abs(offset) / 60));
  const offsetMinutes = pad(Math.abs(offset) % 60);

  const date = getDateStringWithDash(now);
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`;

  return `${date}T${time}${sign}${offsetHours}:${offsetMinutes}`;
}

/**
 * YYYY-MM-DD (로컬 타임존)
 * 로그 디렉터리 이름에 사용
 */
export function getDateStringWithDash(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}
