// Fedora 3 REST response bodies for the client and parser tests

const MANAGEMENT_NS = 'http://www.fedora.info/definitions/1/0/management/';
const ACCESS_NS = 'http://www.fedora.info/definitions/1/0/access/';

export interface ProfileFixture {
  pid: string;
  dsid: string;
  created?: string;
  checksumType?: string;
  checksum?: string;
  valid?: string;
  versionable?: string;
  mime?: string;
}

function profileBody(fixture: ProfileFixture): string {
  const validity = fixture.valid !== undefined ? `<dsChecksumValid>${fixture.valid}</dsChecksumValid>` : '';
  return [
    `<dsLabel>${fixture.dsid} datastream</dsLabel>`,
    `<dsVersionID>${fixture.dsid}.0</dsVersionID>`,
    `<dsCreateDate>${fixture.created ?? '2020-01-01T00:00:00.000Z'}</dsCreateDate>`,
    '<dsState>A</dsState>',
    `<dsMIME>${fixture.mime ?? 'text/xml'}</dsMIME>`,
    '<dsControlGroup>X</dsControlGroup>',
    '<dsSize>128</dsSize>',
    `<dsVersionable>${fixture.versionable ?? 'true'}</dsVersionable>`,
    `<dsChecksumType>${fixture.checksumType ?? 'MD5'}</dsChecksumType>`,
    `<dsChecksum>${fixture.checksum ?? 'abc123'}</dsChecksum>`,
    validity
  ].join('');
}

export function profileXml(fixture: ProfileFixture): string {
  return '<?xml version="1.0" encoding="UTF-8"?>' +
    `<datastreamProfile xmlns="${MANAGEMENT_NS}" pid="${fixture.pid}" dsID="${fixture.dsid}">` +
    profileBody(fixture) +
    '</datastreamProfile>';
}

/**
 * History with one version per creation date, newest first
 */
export function historyXml(pid: string, dsid: string, created: string[]): string {
  const versions = created
    .map(date => `<datastreamProfile pid="${pid}" dsID="${dsid}">${profileBody({ pid, dsid, created: date })}</datastreamProfile>`)
    .join('');
  return '<?xml version="1.0" encoding="UTF-8"?>' +
    `<datastreamHistory xmlns="${MANAGEMENT_NS}" pid="${pid}" dsID="${dsid}">${versions}</datastreamHistory>`;
}

export function listingXml(pid: string, dsids: string[]): string {
  const entries = dsids
    .map(dsid => `<datastream dsid="${dsid}" label="${dsid} datastream" mimeType="text/xml"/>`)
    .join('');
  return '<?xml version="1.0" encoding="UTF-8"?>' +
    `<objectDatastreams xmlns="${ACCESS_NS}" pid="${pid}" baseURL="http://localhost:8080/fedora/">${entries}</objectDatastreams>`;
}
