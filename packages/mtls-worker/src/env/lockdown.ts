import 'ses';

try {
  lockdown({
    consoleTaming: 'unsafe',
    errorTaming: 'unsafe',
    overrideTaming: 'severe',
    domainTaming: 'unsafe',
    stackFiltering: 'concise',
  });
} catch (error) {
  // eslint-disable-next-line no-console
  console.error('SES lockdown failed:', error);
  throw error;
}
