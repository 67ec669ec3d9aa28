export const SIMULATED_LISTING = [
  '',
  'TRANSFER  STATE     PROGRESS  PATH',
  '1         ACTIVE    12%       /data/sample_file.zip',
  '2         QUEUED    0%        /data/another_file.pdf',
  ''
].join('\n');

export const SAMPLE_NATIVE_LISTING = [
  '',
  '⇓    1234  /Downloads/ubuntu-22.04.iso  45.2% of  3.54 GB ACTIVE',
  '↑    5678  /Uploads/video.mp4  78.5% of  1.23 GB ACTIVE',
  '⇓    9012  /Downloads/document.pdf  0.0% of  15.2 MB QUEUED',
  '⇓    3456  /Downloads/large_archive.zip  12.8% of  8.91 GB RETRYING',
  ''
].join('\n');
