export const DEFAULT_TEST_SUBJECT = '证件管理系统 - 测试邮件';

/**
 * Body of the configuration test mail. {send_time} is required.
 */
export const TEST_MESSAGE_TEMPLATE = `<!DOCTYPE html>
<html>
<head>
    <meta charset="UTF-8">
    <title>测试邮件</title>
</head>
<body>
    <h2>证件管理系统测试邮件</h2>
    <p>这是一封测试邮件，用于验证邮件配置是否正确。</p>
    <p>如果您收到此邮件，说明邮件系统配置成功！</p>
    <br>
    <p><strong>发送时间：</strong>{send_time}</p>
    <p><strong>系统信息：</strong>人员证件有效期管控系统</p>
    <br>
    <p>此邮件由系统自动发送，请勿回复。</p>
</body>
</html>`;
