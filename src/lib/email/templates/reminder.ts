/**
 * Default reminder mail templates.
 *
 * Placeholders:
 * - subject: {count}, {today_date}
 * - body: {table_rows}
 * - row: {person_name}, {document_type}, {expiry_date}, {days_left}, {remarks}, {color}
 */

export const DEFAULT_SUBJECT_TEMPLATE = '证件到期提醒 - {count}个证件需要关注 ({today_date})';

export const DEFAULT_BODY_TEMPLATE = `<!DOCTYPE html>
<html>
<head>
    <meta charset="UTF-8">
    <title>证件到期提醒</title>
</head>
<body>
    <h2>证件到期提醒</h2>
    <p>以下证件即将到期或已过期，请及时处理：</p>
    <table border="1" style="border-collapse: collapse; width: 100%;">
        <tr style="background-color: #f2f2f2;">
            <th>姓名</th>
            <th>证件类型</th>
            <th>到期日期</th>
            <th>剩余天数</th>
            <th>备注</th>
        </tr>
        {table_rows}
    </table>
    <br>
    <p>此邮件由系统自动发送，请勿回复。</p>
</body>
</html>`;

export const DEFAULT_ROW_TEMPLATE = `<tr>
            <td>{person_name}</td>
            <td>{document_type}</td>
            <td>{expiry_date}</td>
            <td style="color: {color};">{days_left}</td>
            <td>{remarks}</td>
        </tr>`;
